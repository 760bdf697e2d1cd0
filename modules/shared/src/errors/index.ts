/**
 * OpenID Provider - Error Module
 *
 * @module errors
 */

export { OpenIdErrors } from './openid-error-codes';

export type { OpenIdErrorCode } from './openid-error-codes';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorMessages } from './error-messages';

export { ProtocolError, MessageError } from './protocol-errors';
