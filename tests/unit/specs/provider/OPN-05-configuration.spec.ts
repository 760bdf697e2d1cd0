/**
 * OPN-05: Environment Configuration
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { clearConfigCache, getProviderConfig } from '@openid-provider/openid2-provider';

function stubRequiredEnv(): void {
  vi.stubEnv('TABLE_NAME', 'openid-table');
  vi.stubEnv('BASE_URL', 'https://id.example.org');
  vi.stubEnv('OP_ENDPOINT_URL', 'https://id.example.org/openid/');
  vi.stubEnv('LOGIN_ROUTER_URL', 'https://id.example.org/login');
  vi.stubEnv('CSRF_SECRET', 'test-secret');
}

describe('OPN-05: Environment Configuration', () => {
  beforeEach(() => {
    clearConfigCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCache();
  });

  it('should apply defaults to optional settings', () => {
    stubRequiredEnv();
    vi.stubEnv('CONFIRM_URL', '');
    vi.stubEnv('SESSION_COOKIE_NAME', '');
    vi.stubEnv('SESSION_COOKIE_DOMAIN', '');
    vi.stubEnv('CONVERSATION_TTL_SECONDS', '');
    vi.stubEnv('ASSOCIATION_LIFETIME_SECONDS', '');

    expect(getProviderConfig()).toEqual({
      tableName: 'openid-table',
      baseUrl: 'https://id.example.org',
      opEndpointUrl: 'https://id.example.org/openid/',
      loginRouterUrl: 'https://id.example.org/login',
      confirmUrl: '/openid/confirm',
      csrfSecret: 'test-secret',
      sessionCookie: { name: '__Host-sid', domain: undefined },
      conversationTtlSeconds: 86400,
      associationLifetimeSeconds: 3600,
    });
  });

  it('should read overrides', () => {
    stubRequiredEnv();
    vi.stubEnv('SESSION_COOKIE_NAME', 'sid');
    vi.stubEnv('SESSION_COOKIE_DOMAIN', 'example.org');
    vi.stubEnv('ASSOCIATION_LIFETIME_SECONDS', '600');

    const config = getProviderConfig();

    expect(config.sessionCookie).toEqual({ name: 'sid', domain: 'example.org' });
    expect(config.associationLifetimeSeconds).toBe(600);
  });

  it('should fail on a missing required variable', () => {
    stubRequiredEnv();
    vi.stubEnv('CSRF_SECRET', '');

    expect(() => getProviderConfig()).toThrow('Missing required environment variable: CSRF_SECRET');
  });

  it('should fail on a non-numeric lifetime', () => {
    stubRequiredEnv();
    vi.stubEnv('CONVERSATION_TTL_SECONDS', 'forever');

    expect(() => getProviderConfig()).toThrow('Invalid numeric value for CONVERSATION_TTL_SECONDS: forever');
  });

  it('should cache the first load', () => {
    stubRequiredEnv();
    const first = getProviderConfig();
    vi.stubEnv('BASE_URL', 'https://other.example.org');

    expect(getProviderConfig()).toBe(first);
  });
});
