/**
 * API Gateway HTTP API v2 event builders.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import type { StructuredResponse } from '@openid-provider/shared';

interface EventOptions {
  method?: 'GET' | 'POST' | 'PUT';
  path?: string;
  query?: Record<string, string>;
  form?: Record<string, string>;
  cookies?: string[];
}

export function buildEvent(options: EventOptions = {}): APIGatewayProxyEventV2 {
  const method = options.method ?? 'GET';
  const path = options.path ?? '/openid/';
  const rawQueryString = options.query ? new URLSearchParams(options.query).toString() : '';
  return {
    version: '2.0',
    routeKey: `${method} ${path}`,
    rawPath: path,
    rawQueryString,
    cookies: options.cookies,
    headers: {
      'user-agent': 'vitest',
      ...(options.form && { 'content-type': 'application/x-www-form-urlencoded' }),
    },
    queryStringParameters: options.query,
    body: options.form ? new URLSearchParams(options.form).toString() : undefined,
    isBase64Encoded: false,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'id.example.org',
      domainPrefix: 'id',
      http: {
        method,
        path,
        protocol: 'HTTP/1.1',
        sourceIp: '127.0.0.1',
        userAgent: 'vitest',
      },
      requestId: 'test-request',
      routeKey: `${method} ${path}`,
      stage: '$default',
      time: '15/Jan/2024:10:30:00 +0000',
      timeEpoch: 1705314600000,
    },
  };
}

export function header(response: StructuredResponse, name: string): string | undefined {
  const value = response.headers?.[name];
  return value === undefined ? undefined : String(value);
}

/** Query parameters of a redirect response's Location */
export function locationParams(response: StructuredResponse): URLSearchParams {
  const location = header(response, 'Location');
  if (!location) {
    throw new Error('Response has no Location header');
  }
  return new URL(location, 'https://id.example.org').searchParams;
}
