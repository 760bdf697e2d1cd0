/**
 * Test Fixtures
 */

import { AuditLogger, AX_NS } from '@openid-provider/shared';
import { DefaultAssociationService } from '@openid-provider/openid2-association';
import { IdentityResolver, OpenIdProvider } from '@openid-provider/openid2-provider';
import type { ProviderEnvConfig } from '@openid-provider/openid2-provider';
import { InMemoryAssociationStore } from './in-memory';

export const BASE_URL = 'https://id.example.org';
export const OP_ENDPOINT_URL = 'https://id.example.org/openid/';
export const RETURN_TO = 'https://ci.example.org/securityRealm/finishLogin';
export const REALM = 'https://ci.example.org';

export const ALICE = { userIdentifier: 'alice', email: 'alice@example.org' };

export const TEST_CONFIG: ProviderEnvConfig = {
  tableName: 'test-table',
  baseUrl: BASE_URL,
  opEndpointUrl: OP_ENDPOINT_URL,
  loginRouterUrl: 'https://id.example.org/login',
  confirmUrl: '/openid/confirm',
  csrfSecret: 'test-secret',
  sessionCookie: { name: '__Host-sid' },
  conversationTtlSeconds: 86400,
  associationLifetimeSeconds: 3600,
};

export function testAuditLogger(): AuditLogger {
  return new AuditLogger({ requestId: 'test-request', ip: '127.0.0.1' });
}

export function createAssociationService(store = new InMemoryAssociationStore()): DefaultAssociationService {
  return new DefaultAssociationService(store, {
    opEndpointUrl: OP_ENDPOINT_URL,
    associationLifetimeSeconds: TEST_CONFIG.associationLifetimeSeconds,
  });
}

export function createProvider(associations = createAssociationService()): OpenIdProvider {
  return new OpenIdProvider({
    associations,
    identities: new IdentityResolver(BASE_URL),
    audit: testAuditLogger(),
  });
}

/** openid.* parameters of a checkid request */
export function checkidParams(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    'openid.ns': 'http://specs.openid.net/auth/2.0',
    'openid.mode': 'checkid_setup',
    'openid.realm': REALM,
    'openid.return_to': RETURN_TO,
    'openid.claimed_id': 'http://specs.openid.net/auth/2.0/identifier_select',
    'openid.identity': 'http://specs.openid.net/auth/2.0/identifier_select',
    ...overrides,
  };
}

/** AX fetch request for email, friendly name and an unsupported attribute */
export const AX_FETCH_PARAMS: Record<string, string> = {
  'openid.ns.ext1': AX_NS,
  'openid.ext1.mode': 'fetch_request',
  'openid.ext1.type.e': 'http://axschema.org/contact/email',
  'openid.ext1.type.n': 'http://axschema.org/namePerson/friendly',
  'openid.ext1.type.x': 'http://example.com/unknown',
  'openid.ext1.required': 'e,n,x',
};
