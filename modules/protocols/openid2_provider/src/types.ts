/**
 * OpenID 2.0 Provider - Type Definitions
 *
 * Entity types are re-exported from shared_types for Single Source of Truth.
 *
 * @module openid2_provider/types
 */

import type { OpenIdMessage } from '@openid-provider/shared';
import type { SessionCookieConfig } from '../../../shared_types/auth-session';

export type {
    AssociationService,
    AssociationStore,
    ConversationRepository,
    ParameterList,
    ProfileSource,
} from '../../../shared_types/api';

export type { AuthenticatedProfile } from '../../../shared_types/auth-session';
export type { ConversationRecord } from '../../../shared_types/conversation';

// =============================================================================
// Environment Configuration
// =============================================================================

/**
 * Runtime configuration injected via Lambda environment variables.
 *
 * Environment Variable Mapping:
 * - TABLE_NAME → tableName
 * - BASE_URL → baseUrl (identity URLs are `${BASE_URL}~${userId}`)
 * - OP_ENDPOINT_URL → opEndpointUrl
 * - LOGIN_ROUTER_URL → loginRouterUrl
 * - CONFIRM_URL → confirmUrl
 * - CSRF_SECRET → csrfSecret
 * - SESSION_COOKIE_NAME / SESSION_COOKIE_DOMAIN → sessionCookie
 * - CONVERSATION_TTL_SECONDS → conversationTtlSeconds
 * - ASSOCIATION_LIFETIME_SECONDS → associationLifetimeSeconds
 */
export interface ProviderEnvConfig {
    readonly tableName: string;
    readonly baseUrl: string;
    readonly opEndpointUrl: string;
    readonly loginRouterUrl: string;
    readonly confirmUrl: string;
    readonly csrfSecret: string;
    readonly sessionCookie: SessionCookieConfig;
    readonly conversationTtlSeconds: number;
    readonly associationLifetimeSeconds: number;
}

// =============================================================================
// Protocol Results
// =============================================================================

/**
 * Outcome of running the state machine over one request.
 *
 * - direct: Key-Value Form answer to associate / check_authentication
 * - redirect: indirect response, the user agent goes to `url`
 * - confirmation_required: the realm is not approved yet; the HTTP layer
 *   decides between login, confirmation page and setup_needed
 */
export type ProtocolResult =
    | { readonly kind: 'direct'; readonly message: OpenIdMessage }
    | { readonly kind: 'redirect'; readonly url: string; readonly message: OpenIdMessage }
    | {
          readonly kind: 'confirmation_required';
          readonly realm: string;
          readonly returnTo?: string;
          readonly immediate: boolean;
      };

export type RedirectResult = Extract<ProtocolResult, { readonly kind: 'redirect' }>;
