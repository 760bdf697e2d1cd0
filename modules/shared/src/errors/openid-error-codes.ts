/**
 * OpenID Provider - Error Codes
 *
 * Values of the openid.error_code field and the internal error codes
 * used in direct error responses.
 *
 * @see OpenID 2.0 Section 5.1.2.2 - Error Responses
 * @see OpenID 2.0 Section 8.2.4 - Unsuccessful Response Parameters
 */

// =============================================================================
// Direct Response Error Codes
// =============================================================================

export const OpenIdErrors = {
    /** The requested association or session type is not supported */
    UNSUPPORTED_TYPE: 'unsupported-type',

    /** The request mode is missing or not one of the supported modes */
    UNKNOWN_MODE: 'unknown_mode',

    /** A required protocol parameter is missing or malformed */
    INVALID_REQUEST: 'invalid_request',

    /** The association service could not build or verify a message */
    MESSAGE_ERROR: 'message_error',

    /** The provider encountered an unexpected condition */
    SERVER_ERROR: 'server_error',
} as const;

export type OpenIdErrorCode = typeof OpenIdErrors[keyof typeof OpenIdErrors];
