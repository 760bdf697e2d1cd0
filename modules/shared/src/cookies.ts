/**
 * OpenID Provider - Session Cookie Helpers
 *
 * The browser session cookie keys both the OpenID conversation and the
 * authenticated session written by the login subsystem.
 *
 * Cookie attributes follow OWASP recommendations:
 * - HttpOnly: Prevents JavaScript access (XSS protection)
 * - Secure: Only sent over HTTPS
 * - SameSite=Lax: CSRF protection while allowing top-level navigation
 *   (relying parties send users here with top-level redirects)
 * - Path=/: Applies to all paths
 *
 * If the cookie name starts with __Host-, the Domain attribute is omitted.
 *
 * @see https://datatracker.ietf.org/doc/html/draft-ietf-httpbis-rfc6265bis#section-4.1.3.2
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import type { SessionCookieConfig } from '../../shared_types/auth-session';

/**
 * Parse cookies from the Cookie header.
 *
 * @returns Map of cookie name to value
 */
export function parseCookies(cookieHeader: string | undefined): Map<string, string> {
    const cookies = new Map<string, string>();
    if (!cookieHeader) return cookies;

    for (const pair of cookieHeader.split(';')) {
        const [name, ...valueParts] = pair.trim().split('=');
        if (name) {
            cookies.set(name, valueParts.join('='));
        }
    }
    return cookies;
}

/**
 * Get the session ID from the session cookie.
 * HTTP API v2 moves cookies out of the headers into `event.cookies`.
 */
export function getSessionIdFromCookie(event: APIGatewayProxyEventV2, cookieName: string): string | undefined {
    const cookieHeader = event.cookies?.join('; ') || event.headers?.cookie;
    const value = parseCookies(cookieHeader).get(cookieName);
    return value || undefined;
}

function cookieAttributes(cookie: SessionCookieConfig): string[] {
    const parts = ['Path=/', 'HttpOnly', 'Secure', 'SameSite=Lax'];
    if (cookie.domain && !cookie.name.startsWith('__Host-')) {
        parts.push(`Domain=${cookie.domain}`);
    }
    return parts;
}

/**
 * Build a Set-Cookie header that starts a browser session.
 */
export function buildSessionCookieHeader(
    cookie: SessionCookieConfig,
    sessionId: string,
    maxAgeSeconds: number
): string {
    return [`${cookie.name}=${sessionId}`, `Max-Age=${maxAgeSeconds}`, ...cookieAttributes(cookie)].join('; ');
}

/**
 * Build a Set-Cookie header that clears the session cookie.
 */
export function buildClearCookieHeader(cookie: SessionCookieConfig): string {
    return [`${cookie.name}=`, 'Max-Age=0', ...cookieAttributes(cookie)].join('; ');
}
