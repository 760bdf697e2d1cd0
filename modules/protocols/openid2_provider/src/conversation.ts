/**
 * OpenID 2.0 Provider - Conversation State
 *
 * One instance per browser session while an OpenID exchange is active.
 * The dispatcher receives it explicitly; nothing is read from an ambient
 * session.
 *
 * Invariants:
 * - requestParameters, mode, realm and returnTo are replaced together, on
 *   each new protocol request
 * - identity and authenticatedUser are set only by the confirmation step
 * - approved realms only grow until the session ends
 *
 * @module openid2_provider/conversation
 */

import { RealmApprovalStore } from './realm-approval';
import type { AuthenticatedProfile, ConversationRecord, ParameterList } from './types';

// =============================================================================
// Realm Derivation
// =============================================================================

/**
 * Realm of a request: openid.realm, else the host of openid.return_to, else
 * return_to itself when it does not parse as a URL or has no host (schemes
 * such as `urn:` parse with an empty hostname).
 *
 * An explicit realm is taken as is, even when its host differs from
 * return_to's.
 *
 * @example
 * deriveRealm(undefined, 'https://ci.example.org/path') // 'ci.example.org'
 * deriveRealm(undefined, 'not a url')                   // 'not a url'
 * deriveRealm(undefined, 'urn:rp:two')                  // 'urn:rp:two'
 */
export function deriveRealm(realm: string | undefined, returnTo: string | undefined): string | undefined {
    if (realm !== undefined || returnTo === undefined) {
        return realm;
    }
    try {
        const { hostname } = new URL(returnTo);
        return hostname || returnTo;
    } catch {
        return returnTo;
    }
}

// =============================================================================
// Conversation State
// =============================================================================

export class ConversationState {
    readonly sessionId: string;
    readonly approvals: RealmApprovalStore;

    private parameters: ParameterList = {};
    private currentMode?: string;
    private currentRealm?: string;
    private currentReturnTo?: string;
    private boundIdentity?: string;
    private boundUser?: AuthenticatedProfile;

    private constructor(sessionId: string, approvals: RealmApprovalStore) {
        this.sessionId = sessionId;
        this.approvals = approvals;
    }

    /** Start an empty conversation for a browser session */
    static create(sessionId: string): ConversationState {
        return new ConversationState(sessionId, new RealmApprovalStore());
    }

    static fromRecord(record: ConversationRecord): ConversationState {
        const state = new ConversationState(record.sessionId, new RealmApprovalStore(record.approvedRealms));
        state.parameters = { ...record.requestParameters };
        state.currentMode = record.mode;
        state.currentRealm = record.realm;
        state.currentReturnTo = record.returnTo;
        state.boundIdentity = record.identity;
        state.boundUser = record.authenticatedUser;
        return state;
    }

    toRecord(): ConversationRecord {
        return {
            sessionId: this.sessionId,
            requestParameters: { ...this.parameters },
            mode: this.currentMode,
            realm: this.currentRealm,
            returnTo: this.currentReturnTo,
            approvedRealms: this.approvals.toArray(),
            identity: this.boundIdentity,
            authenticatedUser: this.boundUser,
        };
    }

    get requestParameters(): ParameterList {
        return this.parameters;
    }

    get mode(): string | undefined {
        return this.currentMode;
    }

    get realm(): string | undefined {
        return this.currentRealm;
    }

    get returnTo(): string | undefined {
        return this.currentReturnTo;
    }

    get identity(): string | undefined {
        return this.boundIdentity;
    }

    get authenticatedUser(): AuthenticatedProfile | undefined {
        return this.boundUser;
    }

    /**
     * Take a snapshot of a new protocol request and derive its realm.
     */
    begin(params: ParameterList): void {
        this.parameters = { ...params };
        this.currentMode = params['openid.mode'];
        this.currentReturnTo = params['openid.return_to'];
        this.currentRealm = deriveRealm(params['openid.realm'], this.currentReturnTo);
    }

    /**
     * Record who confirmed the exchange. Called by the confirmation step only.
     */
    bindIdentity(identity: string, user: AuthenticatedProfile): void {
        this.boundIdentity = identity;
        this.boundUser = user;
    }
}
