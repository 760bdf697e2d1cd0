/**
 * OpenID 2.0 Provider - Protocol Dispatcher
 *
 * The per-conversation state machine behind the protocol endpoint.
 *
 * States:
 *   START
 *     ├─ associate              → ASSOCIATED            (direct response)
 *     ├─ check_authentication   → VERIFIED              (direct response)
 *     ├─ checkid_setup | checkid_immediate
 *     │    ├─ realm not approved → AWAITING_CONFIRMATION (confirmation_required)
 *     │    └─ realm approved     → BUILDING_RESPONSE → AUTH_RESPONSE (redirect)
 *     └─ anything else          → ERROR                 (ProtocolError)
 *
 *   AWAITING_CONFIRMATION
 *     ├─ confirm → CONFIRMED → START (same request parameters)
 *     └─ deny    → negative assertion (setup_needed / cancel)
 *
 * checkid_setup and checkid_immediate share gating and response building;
 * the HTTP layer decides what to do with confirmation_required.
 *
 * @module openid2_provider/dispatcher
 * @see https://openid.net/specs/openid-authentication-2_0.html#requesting_authentication
 */

import {
    ErrorMessages,
    OpenIdErrors,
    OpenIdMessage,
    ProtocolError,
    RequestModes,
    type AuditLogger,
} from '@openid-provider/shared';
import { attachFetchResponse, parseAxRequest, respond } from './attribute-exchange';
import type { ConversationState } from './conversation';
import type { IdentityResolver } from './identity';
import type {
    AssociationService,
    AuthenticatedProfile,
    ParameterList,
    ProtocolResult,
    RedirectResult,
} from './types';

type CheckidMode = typeof RequestModes.CHECKID_SETUP | typeof RequestModes.CHECKID_IMMEDIATE;

export interface ProviderDependencies {
    readonly associations: AssociationService;
    readonly identities: IdentityResolver;
    readonly audit: AuditLogger;
}

export function isCheckidMode(mode: string | undefined): mode is CheckidMode {
    return mode === RequestModes.CHECKID_SETUP || mode === RequestModes.CHECKID_IMMEDIATE;
}

export class OpenIdProvider {
    constructor(private readonly deps: ProviderDependencies) {}

    /**
     * Landing point for a protocol request: snapshot its parameters into the
     * conversation, derive the realm, then dispatch.
     */
    async entryPoint(conversation: ConversationState, params: ParameterList): Promise<ProtocolResult> {
        conversation.begin(params);
        return this.handle(conversation.mode, conversation.requestParameters, conversation);
    }

    /**
     * Dispatch on the request mode.
     *
     * @throws ProtocolError on an unknown or missing mode, or a checkid
     *         request with neither realm nor return_to
     * @throws MessageError when the association service cannot build or
     *         verify a message
     */
    async handle(
        mode: string | undefined,
        params: ParameterList,
        conversation: ConversationState
    ): Promise<ProtocolResult> {
        switch (mode) {
            case RequestModes.ASSOCIATE:
                return this.associate(params);
            case RequestModes.CHECK_AUTHENTICATION:
                return this.checkAuthentication(params);
            case RequestModes.CHECKID_SETUP:
            case RequestModes.CHECKID_IMMEDIATE:
                return this.checkid(mode, params, conversation);
            default:
                throw new ProtocolError(ErrorMessages.UNKNOWN_REQUEST + (mode ?? ''), OpenIdErrors.UNKNOWN_MODE);
        }
    }

    /**
     * The user approved the pending request's realm: remember the approval,
     * bind the user's identity and run the request again.
     *
     * @throws ProtocolError when no checkid request is pending
     */
    async confirm(conversation: ConversationState, profile: AuthenticatedProfile): Promise<ProtocolResult> {
        const { mode, realm } = this.pendingRequest(conversation);

        const identity = this.deps.identities.resolve(profile.userIdentifier);
        conversation.approvals.approve(realm);
        conversation.bindIdentity(identity, profile);

        this.deps.audit.realmApproved({ type: 'USER', sub: profile.userIdentifier }, { realm, identity });

        return this.handle(mode, conversation.requestParameters, conversation);
    }

    /**
     * Answer the pending request negatively: `setup_needed` for
     * checkid_immediate, `cancel` for checkid_setup.
     *
     * @throws ProtocolError when no checkid request is pending
     */
    async deny(conversation: ConversationState): Promise<RedirectResult> {
        const { mode, realm } = this.pendingRequest(conversation);
        const params = conversation.requestParameters;

        const response = await this.deps.associations.authResponse(params, '', '', false);

        this.deps.audit.assertionDenied({ realm, returnTo: conversation.returnTo ?? '', mode });

        return { kind: 'redirect', url: response.getDestinationUrl(), message: response };
    }

    /**
     * End the conversation. The caller discards the persisted state and the
     * authenticated session.
     */
    logout(conversation: ConversationState): void {
        const actor = conversation.authenticatedUser
            ? { type: 'USER' as const, sub: conversation.authenticatedUser.userIdentifier }
            : { type: 'ANONYMOUS' as const };
        this.deps.audit.logout(actor, { sessionId: conversation.sessionId });
    }

    // -------------------------------------------------------------------------
    // Modes
    // -------------------------------------------------------------------------

    private async associate(params: ParameterList): Promise<ProtocolResult> {
        const message = await this.deps.associations.associationResponse(params);
        this.deps.audit.associated({
            assocType: params['openid.assoc_type'] ?? '',
            sessionType: params['openid.session_type'] ?? '',
            established: message.has('assoc_handle'),
        });
        return { kind: 'direct', message };
    }

    private async checkAuthentication(params: ParameterList): Promise<ProtocolResult> {
        const message = await this.deps.associations.verify(params);
        this.deps.audit.assertionVerified({
            assocHandle: params['openid.assoc_handle'] ?? '',
            valid: message.get('is_valid') === 'true',
        });
        return { kind: 'direct', message };
    }

    private async checkid(
        mode: CheckidMode,
        params: ParameterList,
        conversation: ConversationState
    ): Promise<ProtocolResult> {
        const realm = conversation.realm;
        if (realm === undefined) {
            throw new ProtocolError(ErrorMessages.MISSING_REALM);
        }

        const identity = conversation.identity;
        const user = conversation.authenticatedUser;
        if (!conversation.approvals.isApproved(realm) || !identity || !user) {
            return {
                kind: 'confirmation_required',
                realm,
                returnTo: conversation.returnTo,
                immediate: mode === RequestModes.CHECKID_IMMEDIATE,
            };
        }

        const response = await this.deps.associations.authResponse(params, identity, identity, true);
        const attributes = await this.attachAttributes(response, params, user);

        this.deps.audit.assertionIssued(
            { type: 'USER', sub: user.userIdentifier },
            { realm, returnTo: conversation.returnTo ?? '', mode, identity, attributes }
        );

        return { kind: 'redirect', url: response.getDestinationUrl(), message: response };
    }

    /**
     * Answer an AX fetch request on the assertion and sign what was added.
     *
     * @returns aliases of the disclosed attributes
     */
    private async attachAttributes(
        response: OpenIdMessage,
        params: ParameterList,
        user: AuthenticatedProfile
    ): Promise<string[]> {
        const request = parseAxRequest(OpenIdMessage.fromParameters(params));
        if (request.kind !== 'fetch') {
            return [];
        }

        const values = respond(request, user);
        const keys = attachFetchResponse(response, values);
        await this.deps.associations.sign(response, keys);
        return values.map(value => value.alias);
    }

    private pendingRequest(conversation: ConversationState): { mode: CheckidMode; realm: string } {
        const mode = conversation.mode;
        const realm = conversation.realm;
        if (!isCheckidMode(mode) || realm === undefined) {
            throw new ProtocolError(ErrorMessages.NO_PENDING_REQUEST);
        }
        return { mode, realm };
    }
}
