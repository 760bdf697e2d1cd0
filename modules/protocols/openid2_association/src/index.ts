/**
 * OpenID 2.0 Associations
 *
 * Default implementation of the AssociationService port: Diffie-Hellman and
 * no-encryption associations, HMAC-SHA1 / HMAC-SHA256 signatures and
 * check_authentication.
 *
 * @module openid2_association
 * @see https://openid.net/specs/openid-authentication-2_0.html#associations
 */

export { DefaultAssociationService } from './association-service';
export { negotiate, isAssociationType, macAlgorithmOf } from './diffie-hellman';
export type { AssociationServiceConfig, KeyTransport, Negotiation } from './types';
