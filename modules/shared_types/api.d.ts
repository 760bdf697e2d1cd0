/**
 * OpenID Provider - Internal API Contracts
 *
 * Interfaces for communication between modules.
 * These define the PORTS in our Hexagonal Architecture.
 *
 * Design Principles:
 * - The protocol engine depends on ports, never on DynamoDB directly
 * - Association handling is replaceable behind AssociationService
 * - The directory login subsystem is reached only through ProfileSource
 *
 * @see https://alistair.cockburn.us/hexagonal-architecture/
 */

import type { OpenIdMessage } from '../shared/src/message';
import type { AssociationRecord } from './association';
import type { AuthenticatedProfile } from './auth-session';
import type { ConversationRecord } from './conversation';

/** Flat openid.* request parameters, keys include the `openid.` prefix */
export type ParameterList = Readonly<Record<string, string>>;

// =============================================================================
// Association Service Port
// =============================================================================

/**
 * Cryptographic association handling: establishes associations, signs
 * assertions and verifies them for stateless relying parties.
 *
 * Implementations reject malformed input with MessageError.
 */
export interface AssociationService {
    /** Answer `openid.mode=associate`. */
    associationResponse(params: ParameterList): Promise<OpenIdMessage>;

    /**
     * Build the response to a checkid request. A positive, signed `id_res`
     * when `authenticatedAndApproved`, otherwise `setup_needed` (immediate)
     * or `cancel` (setup).
     */
    authResponse(
        params: ParameterList,
        claimedId: string,
        localId: string,
        authenticatedAndApproved: boolean
    ): Promise<OpenIdMessage>;

    /**
     * Re-sign a positive assertion after extension fields were attached.
     * The signed list becomes the current one plus `additionalKeys`.
     */
    sign(message: OpenIdMessage, additionalKeys: readonly string[]): Promise<OpenIdMessage>;

    /** Answer `openid.mode=check_authentication`. */
    verify(params: ParameterList): Promise<OpenIdMessage>;
}

// =============================================================================
// Repository Ports
// =============================================================================

export interface AssociationStore {
    get(handle: string): Promise<AssociationRecord | null>;
    save(association: AssociationRecord): Promise<void>;
    remove(handle: string): Promise<void>;
}

export interface ConversationRepository {
    load(sessionId: string): Promise<ConversationRecord | null>;
    save(conversation: ConversationRecord): Promise<void>;
    remove(sessionId: string): Promise<void>;
}

/**
 * Read side of the directory login subsystem.
 */
export interface ProfileSource {
    /** Profile of the user logged in under this browser session, if any */
    getAuthenticatedProfile(sessionId: string): Promise<AuthenticatedProfile | null>;

    /** End the authenticated browser session */
    invalidate(sessionId: string): Promise<void>;
}
