/**
 * OpenID Provider - Error Classes
 *
 * Failures that abort the current request. Neither is retried and neither
 * produces a partial protocol response.
 *
 * - ProtocolError: the request itself is not a usable OpenID request
 *   (unknown or missing mode, no realm to approve)
 * - MessageError: the association service could not build or verify a
 *   message (malformed parameters, unknown association, DH failure)
 */

import { OpenIdErrors, type OpenIdErrorCode } from './openid-error-codes';

export class ProtocolError extends Error {
    readonly code: OpenIdErrorCode;

    constructor(message: string, code: OpenIdErrorCode = OpenIdErrors.INVALID_REQUEST) {
        super(message);
        this.name = 'ProtocolError';
        this.code = code;
    }
}

export class MessageError extends Error {
    readonly code: OpenIdErrorCode = OpenIdErrors.MESSAGE_ERROR;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MessageError';
    }
}

