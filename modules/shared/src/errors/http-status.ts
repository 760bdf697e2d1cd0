/**
 * OpenID Provider - HTTP Status Codes
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    /** Request succeeded */
    OK: 200,
    /** Indirect response to the relying party */
    FOUND: 302,
    /** Redirect after POST (POST-redirect-GET pattern) */
    SEE_OTHER: 303,
    /** Malformed request or unknown protocol mode */
    BAD_REQUEST: 400,
    /** HTTP method not allowed for this endpoint */
    METHOD_NOT_ALLOWED: 405,
    /** Unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
