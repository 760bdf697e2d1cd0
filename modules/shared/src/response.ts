/**
 * OpenID Provider - Standardized HTTP Response Helpers
 *
 * Provides consistent response formatting for all Lambda functions.
 *
 * Response Kinds:
 * - Direct responses (associate, check_authentication, errors) carry a
 *   Key-Value Form body, HTTP 200 on success and 400 on error
 *   (OpenID 2.0 Section 5.1.2)
 * - Indirect responses redirect the user agent to the relying party with 302
 * - Confirmation pages are HTML
 *
 * Security Headers:
 * - Strict-Transport-Security: Enforces HTTPS connections (HSTS)
 * - X-Content-Type-Options: nosniff - Prevents MIME type sniffing
 * - X-Frame-Options: DENY - Prevents clickjacking
 * - Cache-Control: no-store - Prevents caching of assertions
 *
 * @see https://openid.net/specs/openid-authentication-2_0.html#direct_comm
 * @see RFC 6797 - HTTP Strict Transport Security (HSTS)
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { HttpHeaders, KEY_VALUE_CONTENT_TYPE } from './constants';
import { HttpStatus, OpenIdErrors } from './errors/index';
import { OpenIdMessage } from './message';

// =============================================================================
// Types
// =============================================================================

/**
 * Structured API Gateway response (excludes string shorthand).
 */
export type StructuredResponse = Exclude<APIGatewayProxyResultV2, string>;

// =============================================================================
// Response Headers
// =============================================================================

const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

const KEY_VALUE_HEADERS = {
    [HttpHeaders.CONTENT_TYPE]: KEY_VALUE_CONTENT_TYPE,
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

const REDIRECT_HEADERS = {
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
} as const;

const HTML_HEADERS = {
    'Content-Type': 'text/html;charset=UTF-8',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
    'Content-Security-Policy': "default-src 'none'; style-src 'unsafe-inline'; form-action 'self'; frame-ancestors 'none'",
} as const;

// =============================================================================
// Direct Responses
// =============================================================================

/**
 * Return a message as a Key-Value Form direct response.
 *
 * @example
 * ```typescript
 * return keyValue(await associations.associationResponse(params));
 * ```
 */
export function keyValue(message: OpenIdMessage, statusCode: number = HttpStatus.OK): StructuredResponse {
    return {
        statusCode,
        headers: KEY_VALUE_HEADERS,
        body: message.toKeyValueForm(),
    };
}

/**
 * Return a direct error response.
 *
 * @param statusCode - HTTP status code
 * @param errorCode - value of error_code
 * @param description - value of error
 *
 * @see OpenID 2.0 Section 5.1.2.2
 */
export function error(statusCode: number, errorCode: string, description: string): StructuredResponse {
    const message = OpenIdMessage.create()
        .set('error', singleLine(description))
        .set('error_code', errorCode);
    return keyValue(message, statusCode);
}

/**
 * 400 Bad Request - not a usable OpenID request.
 */
export function protocolError(description: string, errorCode: string = OpenIdErrors.INVALID_REQUEST): StructuredResponse {
    return error(HttpStatus.BAD_REQUEST, errorCode, description);
}

/**
 * 500 Internal Server Error.
 */
export function serverError(description?: string, errorCode: string = OpenIdErrors.SERVER_ERROR): StructuredResponse {
    return error(HttpStatus.INTERNAL_SERVER_ERROR, errorCode, description || 'An unexpected error occurred');
}

/**
 * 405 Method Not Allowed.
 */
export function methodNotAllowed(allowed: string[]): StructuredResponse {
    const response = error(HttpStatus.METHOD_NOT_ALLOWED, OpenIdErrors.INVALID_REQUEST, 'Method not allowed');
    return {
        ...response,
        headers: { ...KEY_VALUE_HEADERS, Allow: allowed.join(', ') },
    };
}

// =============================================================================
// Redirect Responses
// =============================================================================

/**
 * Return an indirect response: HTTP 302 Found to the given URL.
 *
 * @param setCookie - optional Set-Cookie header value
 */
export function redirect(url: string, setCookie?: string): StructuredResponse {
    return redirectWithStatus(HttpStatus.FOUND, url, setCookie);
}

/**
 * Return an HTTP 303 See Other (POST-redirect-GET).
 */
export function seeOther(url: string, setCookie?: string): StructuredResponse {
    return redirectWithStatus(HttpStatus.SEE_OTHER, url, setCookie);
}

function redirectWithStatus(statusCode: number, url: string, setCookie?: string): StructuredResponse {
    const headers: Record<string, string> = {
        ...REDIRECT_HEADERS,
        [HttpHeaders.LOCATION]: url,
    };
    if (setCookie) {
        headers[HttpHeaders.SET_COOKIE] = setCookie;
    }
    return {
        statusCode,
        headers,
        body: '',
    };
}

// =============================================================================
// HTML Responses
// =============================================================================

/**
 * Return an HTML page with security headers.
 *
 * @param setCookie - optional Set-Cookie header value
 */
export function html(body: string, statusCode: number = HttpStatus.OK, setCookie?: string): StructuredResponse {
    const headers: Record<string, string> = { ...HTML_HEADERS };
    if (setCookie) {
        headers[HttpHeaders.SET_COOKIE] = setCookie;
    }
    return {
        statusCode,
        headers,
        body,
    };
}

/**
 * Escape HTML special characters to prevent XSS.
 */
export function escapeHtml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#x27;');
}

/** Key-Value Form values cannot contain newlines */
function singleLine(value: string): string {
    return value.replace(/[\r\n]+/g, ' ');
}
