/**
 * OpenID Provider - Error Messages
 *
 * Human-readable error descriptions used in openid.error fields and logs.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Protocol Endpoint
    // -------------------------------------------------------------------------

    /** Prefix of the unknown-mode error, followed by the received mode */
    UNKNOWN_REQUEST: 'Unknown request: ',

    /** checkid request with neither openid.realm nor openid.return_to */
    MISSING_REALM: 'Missing required parameter: openid.realm or openid.return_to',

    /** checkid request without openid.return_to */
    MISSING_RETURN_TO: 'Missing required parameter: openid.return_to',

    /** Confirmation posted while no checkid request is pending */
    NO_PENDING_REQUEST: 'No OpenID request is awaiting confirmation',

    /** Confirmation form token missing or not bound to this session */
    CSRF_INVALID: 'Security validation failed. Please try again.',

    /** Confirmation form posted for a realm other than the pending request's */
    REALM_MISMATCH: 'The request changed while it awaited confirmation. Please try again.',

    // -------------------------------------------------------------------------
    // Association Service
    // -------------------------------------------------------------------------

    UNSUPPORTED_ASSOCIATION: 'Unsupported association or session type',

    MISSING_DH_PUBLIC: 'Missing required parameter: openid.dh_consumer_public',

    INVALID_DH_PARAMETERS: 'Malformed Diffie-Hellman parameters',

    MISSING_SIGNATURE: 'Missing openid.signed or openid.sig',

    MISSING_SIGNED_FIELD: 'A signed field is not present in the message: ',

    UNKNOWN_ASSOCIATION: 'Unknown or expired association handle',

    // -------------------------------------------------------------------------
    // Server Errors
    // -------------------------------------------------------------------------

    /** Generic server error */
    SERVER_ERROR: 'An unexpected error occurred',
} as const;
