/**
 * OpenID 2.0 Provider - Lambda Handlers
 *
 * Entry points wired to DynamoDB storage and the default association
 * service. See handlers.ts for the request flow.
 *
 * Environment Variables (injected via Terraform):
 *   - TABLE_NAME: DynamoDB table name
 *   - BASE_URL: base of identity URLs
 *   - OP_ENDPOINT_URL: URL of the protocol endpoint
 *   - LOGIN_ROUTER_URL: where unauthenticated users are sent
 *   - CONFIRM_URL: confirmation endpoint (default /openid/confirm)
 *   - CSRF_SECRET: key for confirmation form tokens
 *   - SESSION_COOKIE_NAME / SESSION_COOKIE_DOMAIN: browser session cookie
 *   - CONVERSATION_TTL_SECONDS, ASSOCIATION_LIFETIME_SECONDS
 *
 * @module openid2_provider
 * @see https://openid.net/specs/openid-authentication-2_0.html
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import { DefaultAssociationService } from '@openid-provider/openid2-association';
import { createStorageAdapter } from '@openid-provider/shared';
import { getProviderConfig } from './config';
import { createHandlers, type OpenIdHandlers } from './handlers';

export { createHandlers } from './handlers';
export type { HandlerDependencies, OpenIdHandler, OpenIdHandlers } from './handlers';
export { OpenIdProvider, isCheckidMode } from './dispatcher';
export type { ProviderDependencies } from './dispatcher';
export { ConversationState, deriveRealm } from './conversation';
export { RealmApprovalStore } from './realm-approval';
export { IdentityResolver } from './identity';
export { parseAxRequest, respond, attachFetchResponse } from './attribute-exchange';
export type { AxRequest, FetchRequest, AttributeResponse, AttributeValue } from './attribute-exchange';
export { getProviderConfig, clearConfigCache } from './config';
export type { ProtocolResult, RedirectResult, ProviderEnvConfig } from './types';

// =============================================================================
// Default Wiring
// =============================================================================

/** Built on first use and reused across warm invocations */
let handlers: OpenIdHandlers | null = null;

function getHandlers(): OpenIdHandlers {
    if (!handlers) {
        const config = getProviderConfig();
        const storage = createStorageAdapter({
            tableName: config.tableName,
            conversationTtlSeconds: config.conversationTtlSeconds,
        });
        handlers = createHandlers({
            config,
            conversations: storage.conversations,
            profiles: storage.profiles,
            associations: new DefaultAssociationService(storage.associations, {
                opEndpointUrl: config.opEndpointUrl,
                associationLifetimeSeconds: config.associationLifetimeSeconds,
            }),
        });
    }
    return handlers;
}

// =============================================================================
// Lambda Handlers
// =============================================================================

export const handler = async (
    event: APIGatewayProxyEventV2,
    context: Context
): Promise<APIGatewayProxyResultV2> => getHandlers().entryPoint(event, context);

export const confirmHandler = async (
    event: APIGatewayProxyEventV2,
    context: Context
): Promise<APIGatewayProxyResultV2> => getHandlers().confirm(event, context);

export const logoutHandler = async (
    event: APIGatewayProxyEventV2,
    context: Context
): Promise<APIGatewayProxyResultV2> => getHandlers().logout(event, context);
