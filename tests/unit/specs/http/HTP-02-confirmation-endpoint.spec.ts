/**
 * HTP-02: Confirmation Endpoint
 */

import { describe, it, expect } from 'vitest';
import { createHandlers } from '@openid-provider/openid2-provider';
import { generateCsrfToken } from '@openid-provider/shared';
import {
  InMemoryConversationRepository,
  InMemoryProfileSource,
} from '../../support/in-memory';
import {
  ALICE,
  REALM,
  RETURN_TO,
  TEST_CONFIG,
  checkidParams,
  createAssociationService,
} from '../../support/fixtures';
import { buildEvent, header, locationParams } from '../../support/events';

const COOKIES = ['__Host-sid=sid-1'];
const CSRF_TOKEN = generateCsrfToken('sid-1', 'test-secret');

async function pendingRequest() {
  const conversations = new InMemoryConversationRepository();
  const profiles = new InMemoryProfileSource();
  const handlers = createHandlers({
    config: TEST_CONFIG,
    conversations,
    profiles,
    associations: createAssociationService(),
  });
  await handlers.entryPoint(buildEvent({ query: checkidParams(), cookies: COOKIES }));
  profiles.login('sid-1', ALICE);
  return { handlers, conversations, profiles };
}

function confirmEvent(form: Record<string, string>) {
  return buildEvent({ method: 'POST', path: '/openid/confirm', form, cookies: COOKIES });
}

describe('HTP-02: Confirmation Endpoint', () => {
  it('should redirect to the relying party with an assertion on approval', async () => {
    const { handlers, conversations } = await pendingRequest();

    const response = await handlers.confirm(confirmEvent({ csrf_token: CSRF_TOKEN, realm: REALM, decision: 'approve' }));

    expect(response.statusCode).toBe(302);
    expect(header(response, 'Location')?.startsWith(`${RETURN_TO}?`)).toBe(true);
    const params = locationParams(response);
    expect(params.get('openid.mode')).toBe('id_res');
    expect(params.get('openid.identity')).toBe('https://id.example.org~alice');
    expect(conversations.items.get('sid-1')?.approvedRealms).toEqual([REALM]);
  });

  it('should skip confirmation for the approved realm afterwards', async () => {
    const { handlers } = await pendingRequest();
    await handlers.confirm(confirmEvent({ csrf_token: CSRF_TOKEN, realm: REALM, decision: 'approve' }));

    const response = await handlers.entryPoint(buildEvent({ query: checkidParams(), cookies: COOKIES }));

    expect(response.statusCode).toBe(302);
    expect(locationParams(response).get('openid.mode')).toBe('id_res');
  });

  it('should send cancel when the user declines', async () => {
    const { handlers, conversations } = await pendingRequest();

    const response = await handlers.confirm(confirmEvent({ csrf_token: CSRF_TOKEN, realm: REALM, decision: 'cancel' }));

    expect(response.statusCode).toBe(302);
    expect(locationParams(response).get('openid.mode')).toBe('cancel');
    expect(conversations.items.get('sid-1')?.approvedRealms).toEqual([]);
  });

  it('should reject a confirmation with a bad CSRF token', async () => {
    const { handlers, conversations } = await pendingRequest();

    const response = await handlers.confirm(confirmEvent({ csrf_token: 'forged', decision: 'approve' }));

    expect(response.statusCode).toBe(400);
    expect(response.body).toContain('error:Security validation failed. Please try again.\n');
    expect(conversations.items.get('sid-1')?.approvedRealms).toEqual([]);
  });

  it('should reject a confirmation posted for a realm that is no longer pending', async () => {
    const { handlers, conversations } = await pendingRequest();
    await handlers.entryPoint(buildEvent({
      query: checkidParams({ 'openid.realm': 'https://other.example.org' }),
      cookies: COOKIES,
    }));

    const response = await handlers.confirm(confirmEvent({ csrf_token: CSRF_TOKEN, realm: REALM, decision: 'approve' }));

    expect(response.statusCode).toBe(400);
    expect(response.body).toContain('error:The request changed while it awaited confirmation. Please try again.\n');
    expect(conversations.items.get('sid-1')?.approvedRealms).toEqual([]);
  });

  it('should reject a confirmation with nothing pending', async () => {
    const { handlers } = await pendingRequest();

    const response = await handlers.confirm(buildEvent({
      method: 'POST',
      path: '/openid/confirm',
      form: { csrf_token: generateCsrfToken('sid-2', 'test-secret') },
      cookies: ['__Host-sid=sid-2'],
    }));

    expect(response.statusCode).toBe(400);
    expect(response.body).toContain('error:No OpenID request is awaiting confirmation\n');
  });

  it('should send a logged-out user to the login router', async () => {
    const { handlers, profiles } = await pendingRequest();
    await profiles.invalidate('sid-1');

    const response = await handlers.confirm(confirmEvent({ csrf_token: CSRF_TOKEN }));

    expect(response.statusCode).toBe(302);
    expect(header(response, 'Location')).toBe('https://id.example.org/login?from=%2Fopenid%2Fconfirm');
  });

  it('should render the pending confirmation on GET after login', async () => {
    const { handlers } = await pendingRequest();

    const response = await handlers.confirm(buildEvent({ path: '/openid/confirm', cookies: COOKIES }));

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('<p class="identity">https://id.example.org~alice</p>');
    expect(response.body).toContain('<input type="hidden" name="realm" value="https://ci.example.org">');
  });
});
