/**
 * OpenID 2.0 Associations - Type Definitions
 *
 * @module openid2_association/types
 */

import type { HashAlgorithm } from '@openid-provider/shared';
import type { AssociationType } from '../../../shared_types/association';

export type {
    AssociationRecord,
    AssociationType,
    SessionType,
} from '../../../shared_types/association';

export type { AssociationService, AssociationStore, ParameterList } from '../../../shared_types/api';

// =============================================================================
// Configuration
// =============================================================================

export interface AssociationServiceConfig {
    /** openid.op_endpoint of every positive assertion */
    readonly opEndpointUrl: string;

    /** Lifetime of shared and private associations, in seconds */
    readonly associationLifetimeSeconds: number;
}

// =============================================================================
// Negotiation
// =============================================================================

/**
 * How the MAC key of a new association travels to the relying party.
 * `hash` is the DH session hash; it must match the MAC algorithm size.
 */
export type KeyTransport =
    | { readonly kind: 'plain' }
    | {
          readonly kind: 'diffie-hellman';
          readonly hash: HashAlgorithm;
          readonly modulus: Buffer;
          readonly generator: Buffer;
          readonly consumerPublic: Buffer;
      };

/** Result of checking an associate request's assoc_type / session_type pair */
export type Negotiation =
    | { readonly supported: true; readonly assocType: AssociationType; readonly macAlgorithm: HashAlgorithm }
    | { readonly supported: false };
