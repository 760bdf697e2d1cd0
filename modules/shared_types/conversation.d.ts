/**
 * OpenID Provider - Conversation Entity Types
 *
 * Per-browser-session record of an OpenID exchange.
 *
 * Key Pattern:
 *   PK: OPENID_CONVERSATION#<session_id>
 *   SK: METADATA
 *
 * Lifecycle:
 * 1. Created by the protocol endpoint on the first OpenID request of a session
 * 2. Updated by the confirmation endpoint (approved realms, identity)
 * 3. Deleted on logout, otherwise expired by TTL with the browser session
 */

import type { BaseItem } from './base';
import type { AuthenticatedProfile } from './auth-session';

export interface ConversationRecord {
    /** Browser session identifier (session cookie value) */
    sessionId: string;

    /** Snapshot of the inbound openid.* parameters of the current exchange */
    requestParameters: Record<string, string>;

    mode?: string;
    realm?: string;
    returnTo?: string;

    /** Realms approved in this session, in approval order */
    approvedRealms: string[];

    /** Identity URL, set by the confirmation step only */
    identity?: string;

    authenticatedUser?: AuthenticatedProfile;
}

export interface ConversationItem extends BaseItem, ConversationRecord {
    PK: `OPENID_CONVERSATION#${string}`;
    SK: 'METADATA';
    entityType: 'OPENID_CONVERSATION';
}
