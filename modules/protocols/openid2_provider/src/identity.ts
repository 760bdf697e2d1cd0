/**
 * OpenID 2.0 Provider - Identity Resolver
 *
 * Maps a directory user id to its identity URL. The result is used as both
 * claimed identifier and OP-local identifier; delegation is not supported.
 *
 * @module openid2_provider/identity
 */

export class IdentityResolver {
    constructor(private readonly baseUrl: string) {}

    /**
     * @example
     * new IdentityResolver('https://id.example.org').resolve('alice')
     * // 'https://id.example.org~alice'
     */
    resolve(userIdentifier: string): string {
        return `${this.baseUrl}~${userIdentifier}`;
    }
}
