/**
 * OpenID 2.0 Provider - Realm Approval Store
 *
 * Realms the current user approved during this browser session. Membership
 * is exact string equality: approving `https://example.org` says nothing
 * about `https://www.example.org` or `example.org`.
 *
 * The set only grows; it is discarded with the session.
 *
 * @module openid2_provider/realm-approval
 */

export class RealmApprovalStore {
    private readonly realms: Set<string>;

    constructor(approved: Iterable<string> = []) {
        this.realms = new Set(approved);
    }

    approve(realm: string): void {
        this.realms.add(realm);
    }

    isApproved(realm: string): boolean {
        return this.realms.has(realm);
    }

    /** Approved realms in approval order */
    toArray(): string[] {
        return [...this.realms];
    }
}
