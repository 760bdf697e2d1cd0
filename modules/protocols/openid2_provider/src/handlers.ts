/**
 * OpenID 2.0 Provider - HTTP Handlers
 *
 * Translates API Gateway HTTP API v2 events into dispatcher calls and
 * dispatcher results into HTTP responses.
 *
 * Endpoints:
 *   GET|POST {OP_ENDPOINT_URL}  protocol endpoint (all openid.mode values)
 *   GET      {CONFIRM_URL}      confirmation page for the pending request
 *   POST     {CONFIRM_URL}      approve or cancel the pending request
 *   GET|POST /logout            end the browser session
 *
 * Response Shapes:
 *   - associate / check_authentication: 200 Key-Value Form (400 for an
 *     error message such as unsupported-type)
 *   - checkid success or negative assertion: 302 to the relying party
 *   - realm not approved: 302 to LOGIN_ROUTER_URL?from=CONFIRM_URL when
 *     nobody is logged in, else the confirmation page
 *   - ProtocolError: 400 Key-Value Form, MessageError: 500; never a redirect
 *
 * The handlers are built from their collaborators so tests can run them
 * against in-memory repositories.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    HttpStatus,
    MessageError,
    ProtocolError,
    buildClearCookieHeader,
    buildSessionCookieHeader,
    createLogger,
    generateCsrfToken,
    generateSecureRandom,
    getSessionIdFromCookie,
    keyValue,
    methodNotAllowed,
    parseFormBody,
    parseRequestParameters,
    protocolError,
    redirect,
    seeOther,
    serverError,
    verifyCsrfToken,
    withContext,
    type AuditLogger,
    type Logger,
    type StructuredResponse,
} from '@openid-provider/shared';
import { ConversationState } from './conversation';
import { OpenIdProvider, isCheckidMode } from './dispatcher';
import { IdentityResolver } from './identity';
import { confirmationPage, loginRedirect } from './responses';
import type {
    AssociationService,
    ConversationRepository,
    ProfileSource,
    ProtocolResult,
    ProviderEnvConfig,
} from './types';

// =============================================================================
// Types
// =============================================================================

export interface HandlerDependencies {
    readonly config: ProviderEnvConfig;
    readonly conversations: ConversationRepository;
    readonly profiles: ProfileSource;
    readonly associations: AssociationService;
}

export type OpenIdHandler = (event: APIGatewayProxyEventV2, context?: Context) => Promise<StructuredResponse>;

export interface OpenIdHandlers {
    readonly entryPoint: OpenIdHandler;
    readonly confirm: OpenIdHandler;
    readonly logout: OpenIdHandler;
}

/** Per-request collaborators */
interface RequestScope {
    readonly logger: Logger;
    readonly audit: AuditLogger;
    readonly provider: OpenIdProvider;
}

/** The form field carrying the user's choice on the confirmation page */
const DECISION_CANCEL = 'cancel';

// =============================================================================
// Handler Factory
// =============================================================================

export function createHandlers(deps: HandlerDependencies): OpenIdHandlers {
    const { config, conversations, profiles } = deps;
    const identities = new IdentityResolver(config.baseUrl);

    function scope(event: APIGatewayProxyEventV2, context?: Context): RequestScope {
        const audit = withContext(event, context);
        return {
            logger: createLogger(event, context),
            audit,
            provider: new OpenIdProvider({ associations: deps.associations, identities, audit }),
        };
    }

    async function loadConversation(sessionId: string): Promise<ConversationState | null> {
        const record = await conversations.load(sessionId);
        return record ? ConversationState.fromRecord(record) : null;
    }

    /**
     * The confirmation detour: login first, then the confirmation page.
     */
    async function confirmationStep(
        conversation: ConversationState,
        realm: string,
        setCookie?: string
    ): Promise<StructuredResponse> {
        const profile = await profiles.getAuthenticatedProfile(conversation.sessionId);
        if (!profile) {
            return loginRedirect(config.loginRouterUrl, config.confirmUrl, setCookie);
        }
        return confirmationPage(
            {
                realm,
                returnTo: conversation.returnTo,
                identity: identities.resolve(profile.userIdentifier),
                confirmUrl: config.confirmUrl,
                csrfToken: generateCsrfToken(conversation.sessionId, config.csrfSecret),
            },
            setCookie
        );
    }

    async function respondTo(
        result: ProtocolResult,
        conversation: ConversationState,
        { provider, logger }: RequestScope,
        setCookie?: string
    ): Promise<StructuredResponse> {
        switch (result.kind) {
            case 'direct': {
                const status = result.message.has('error') ? HttpStatus.BAD_REQUEST : HttpStatus.OK;
                return keyValue(result.message, status);
            }
            case 'redirect':
                await conversations.save(conversation.toRecord());
                logger.info('Redirecting to relying party', { mode: result.message.get('mode') });
                return redirect(result.url, setCookie);
            case 'confirmation_required': {
                if (result.immediate) {
                    const denied = await provider.deny(conversation);
                    logger.info('Immediate request needs setup', { realm: result.realm });
                    return redirect(denied.url, setCookie);
                }
                await conversations.save(conversation.toRecord());
                logger.info('Realm awaiting confirmation', { realm: result.realm });
                return confirmationStep(conversation, result.realm, setCookie);
            }
        }
    }

    function failure(err: unknown, logger: Logger): StructuredResponse {
        if (err instanceof ProtocolError) {
            logger.warn('Rejected protocol request', { error: err.message, code: err.code });
            return protocolError(err.message, err.code);
        }
        if (err instanceof MessageError) {
            logger.error('Protocol message error', {
                error: err.message,
                cause: err.cause instanceof Error ? err.cause.message : undefined,
                stack: err.stack,
            });
            return serverError(err.message, err.code);
        }
        const error = err instanceof Error ? err : new Error(String(err));
        logger.error('OpenID endpoint error', { error: error.message, stack: error.stack });
        return serverError(ErrorMessages.SERVER_ERROR);
    }

    // -------------------------------------------------------------------------
    // Protocol Endpoint
    // -------------------------------------------------------------------------

    const entryPoint: OpenIdHandler = async (event, context) => {
        const request = scope(event, context);
        const method = event.requestContext.http.method;
        if (method !== 'GET' && method !== 'POST') {
            return methodNotAllowed(['GET', 'POST']);
        }

        try {
            const params = parseRequestParameters(event);
            request.logger.info('OpenID request received', { method, mode: params['openid.mode'] });

            const existingId = getSessionIdFromCookie(event, config.sessionCookie.name);
            const stored = existingId ? await loadConversation(existingId) : null;
            const sessionId = existingId ?? generateSecureRandom();
            const conversation = stored ?? ConversationState.create(sessionId);
            const setCookie = existingId
                ? undefined
                : buildSessionCookieHeader(config.sessionCookie, sessionId, config.conversationTtlSeconds);

            const result = await request.provider.entryPoint(conversation, params);
            return await respondTo(result, conversation, request, setCookie);
        } catch (err) {
            return failure(err, request.logger);
        }
    };

    // -------------------------------------------------------------------------
    // Confirmation Endpoint
    // -------------------------------------------------------------------------

    const confirm: OpenIdHandler = async (event, context) => {
        const request = scope(event, context);
        const method = event.requestContext.http.method;
        if (method !== 'GET' && method !== 'POST') {
            return methodNotAllowed(['GET', 'POST']);
        }

        try {
            const sessionId = getSessionIdFromCookie(event, config.sessionCookie.name);
            const conversation = sessionId ? await loadConversation(sessionId) : null;
            const realm = conversation?.realm;
            if (!conversation || realm === undefined || !isCheckidMode(conversation.mode)) {
                throw new ProtocolError(ErrorMessages.NO_PENDING_REQUEST);
            }

            if (method === 'GET') {
                return await confirmationStep(conversation, realm);
            }

            const profile = await profiles.getAuthenticatedProfile(conversation.sessionId);
            if (!profile) {
                return loginRedirect(config.loginRouterUrl, config.confirmUrl);
            }

            const form = parseFormBody(event.body, event.isBase64Encoded);
            if (!verifyCsrfToken(conversation.sessionId, form.csrf_token ?? '', config.csrfSecret)) {
                request.logger.warn('CSRF token validation failed');
                throw new ProtocolError(ErrorMessages.CSRF_INVALID);
            }
            if (form.realm !== realm) {
                request.logger.warn('Confirmed realm does not match the pending request', { realm });
                throw new ProtocolError(ErrorMessages.REALM_MISMATCH);
            }

            const result = form.decision === DECISION_CANCEL
                ? await request.provider.deny(conversation)
                : await request.provider.confirm(conversation, profile);

            return await respondTo(result, conversation, request);
        } catch (err) {
            return failure(err, request.logger);
        }
    };

    // -------------------------------------------------------------------------
    // Logout Endpoint
    // -------------------------------------------------------------------------

    const logout: OpenIdHandler = async (event, context) => {
        const request = scope(event, context);

        try {
            const sessionId = getSessionIdFromCookie(event, config.sessionCookie.name);
            if (sessionId) {
                const conversation = (await loadConversation(sessionId)) ?? ConversationState.create(sessionId);
                request.provider.logout(conversation);
                await conversations.remove(sessionId);
                await profiles.invalidate(sessionId);
                request.logger.info('Session ended');
            }
            return seeOther('/', buildClearCookieHeader(config.sessionCookie));
        } catch (err) {
            return failure(err, request.logger);
        }
    };

    return { entryPoint, confirm, logout };
}
