/**
 * OpenID Provider - Authenticated Session Types
 *
 * Browser sessions written by the directory login subsystem after a
 * successful bind. The provider only reads them.
 *
 * Key Pattern:
 *   PK: AUTH_SESSION#<session_id>
 *   SK: METADATA
 */

import type { BaseItem } from './base';

/**
 * Profile attributes of the logged-in directory user that the provider may
 * disclose. `userIdentifier` is the directory `cn`, `email` the `mail` attribute.
 */
export interface AuthenticatedProfile {
    userIdentifier: string;
    email: string;
}

export interface AuthenticatedSessionItem extends BaseItem {
    PK: `AUTH_SESSION#${string}`;
    SK: 'METADATA';
    entityType: 'AUTH_SESSION';

    /** Unique session identifier (session cookie value) */
    sessionId: string;

    /** Directory user id (cn) */
    userIdentifier: string;

    /** Directory mail attribute */
    email: string;

    /** ISO 8601 timestamp when authentication occurred */
    authenticatedAt: string;
}

// =============================================================================
// Session Cookie Configuration
// =============================================================================

export interface SessionCookieConfig {
    /** Cookie name (default: __Host-sid) */
    name: string;
    /** Cookie domain, omitted for __Host- prefixed cookies */
    domain?: string;
}
