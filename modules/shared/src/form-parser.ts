/**
 * OpenID Provider - Request Parameter Parsing
 *
 * Protocol messages arrive as query parameters (GET) or as a URL-encoded
 * form body (POST).
 *
 * @see OpenID 2.0 Section 4.1.2 - HTTP Encoding
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';

/**
 * Parse a URL-encoded form body into a key-value object.
 * Handles base64-encoded bodies from API Gateway.
 */
export function parseFormBody(
    body: string | null | undefined,
    isBase64Encoded: boolean
): Record<string, string> {
    if (!body) {
        return {};
    }

    const decodedBody = isBase64Encoded
        ? Buffer.from(body, 'base64').toString('utf-8')
        : body;

    const result: Record<string, string> = {};
    for (const [key, value] of new URLSearchParams(decodedBody)) {
        result[key] = value;
    }
    return result;
}

/**
 * Collect the parameters of a request: the form body for POST, the query
 * string otherwise.
 */
export function parseRequestParameters(event: APIGatewayProxyEventV2): Record<string, string> {
    if (event.requestContext.http.method === 'POST') {
        return parseFormBody(event.body, event.isBase64Encoded);
    }

    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(event.queryStringParameters ?? {})) {
        if (value !== undefined) {
            // HTTP API joins repeated query parameters with commas
            result[key] = value;
        }
    }
    return result;
}
