/**
 * OpenID Provider - Association Entity Types
 *
 * Key Pattern:
 *   PK: ASSOCIATION#<assoc_handle>
 *   SK: METADATA
 *
 * @see https://openid.net/specs/openid-authentication-2_0.html#associations
 */

import type { BaseItem } from './base';

/** MAC algorithms an association can use */
export type AssociationType = 'HMAC-SHA1' | 'HMAC-SHA256';

/** Association session types (how the MAC key travels to the relying party) */
export type SessionType = 'no-encryption' | 'DH-SHA1' | 'DH-SHA256';

/**
 * A shared secret used to sign positive assertions.
 *
 * Shared associations are established by a relying party through
 * `openid.mode=associate`. Private associations are created by the provider
 * when the relying party runs in stateless mode, and are the only ones
 * accepted by `check_authentication`.
 */
export interface AssociationRecord {
    /** Opaque handle, printable ASCII (0x21-0x7E) */
    handle: string;

    type: AssociationType;

    /** MAC key, base64 */
    macKey: string;

    /** True when created for stateless (check_authentication) verification */
    private: boolean;

    /** ISO 8601 expiry */
    expiresAt: string;
}

export interface AssociationItem extends BaseItem, AssociationRecord {
    PK: `ASSOCIATION#${string}`;
    SK: 'METADATA';
    entityType: 'ASSOCIATION';
}
