/**
 * HTP-01: Protocol Endpoint
 *
 * Direct modes answer in Key-Value Form; checkid requests redirect to the
 * relying party, to the login router, or render the confirmation page.
 */

import { describe, it, expect } from 'vitest';
import { createHandlers } from '@openid-provider/openid2-provider';
import { generateCsrfToken } from '@openid-provider/shared';
import {
  InMemoryConversationRepository,
  InMemoryProfileSource,
} from '../../support/in-memory';
import { ALICE, REALM, TEST_CONFIG, checkidParams, createAssociationService } from '../../support/fixtures';
import { buildEvent, header, locationParams } from '../../support/events';

function setup() {
  const conversations = new InMemoryConversationRepository();
  const profiles = new InMemoryProfileSource();
  const handlers = createHandlers({
    config: TEST_CONFIG,
    conversations,
    profiles,
    associations: createAssociationService(),
  });
  return { handlers, conversations, profiles };
}

describe('HTP-01: Protocol Endpoint', () => {
  it('should answer associate with a Key-Value Form body', async () => {
    const { handlers } = setup();

    const response = await handlers.entryPoint(buildEvent({
      method: 'POST',
      form: {
        'openid.ns': 'http://specs.openid.net/auth/2.0',
        'openid.mode': 'associate',
        'openid.assoc_type': 'HMAC-SHA256',
        'openid.session_type': 'no-encryption',
      },
    }));

    expect(response.statusCode).toBe(200);
    expect(header(response, 'Content-Type')).toBe('text/plain; charset=utf-8');
    expect(response.body).toContain('assoc_type:HMAC-SHA256\n');
  });

  it('should answer an unsupported association type with 400', async () => {
    const { handlers } = setup();

    const response = await handlers.entryPoint(buildEvent({
      method: 'POST',
      form: { 'openid.mode': 'associate', 'openid.assoc_type': 'HMAC-MD5' },
    }));

    expect(response.statusCode).toBe(400);
    expect(response.body).toContain('error_code:unsupported-type\n');
  });

  it('should reject an unknown mode with a direct error', async () => {
    const { handlers } = setup();

    const response = await handlers.entryPoint(buildEvent({ query: { 'openid.mode': 'bogus' } }));

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe(
      'ns:http://specs.openid.net/auth/2.0\nerror:Unknown request: bogus\nerror_code:unknown_mode\n'
    );
    expect(header(response, 'Location')).toBeUndefined();
  });

  it('should send a new browser session to the login router', async () => {
    const { handlers, conversations } = setup();

    const response = await handlers.entryPoint(buildEvent({ query: checkidParams() }));

    expect(response.statusCode).toBe(302);
    expect(header(response, 'Location')).toBe('https://id.example.org/login?from=%2Fopenid%2Fconfirm');
    expect(header(response, 'Set-Cookie')).toMatch(
      /^__Host-sid=[\w-]+; Max-Age=86400; Path=\/; HttpOnly; Secure; SameSite=Lax$/
    );
    expect(conversations.items.size).toBe(1);
  });

  it('should render the confirmation page for a logged-in user', async () => {
    const { handlers, profiles } = setup();
    profiles.login('sid-1', ALICE);

    const response = await handlers.entryPoint(buildEvent({
      query: checkidParams(),
      cookies: ['__Host-sid=sid-1'],
    }));

    expect(response.statusCode).toBe(200);
    expect(header(response, 'Set-Cookie')).toBeUndefined();
    expect(response.body).toContain(`<h1>Sign in to ${REALM}?</h1>`);
    expect(response.body).toContain(
      `<input type="hidden" name="csrf_token" value="${generateCsrfToken('sid-1', 'test-secret')}">`
    );
    expect(response.body).toContain('<form method="post" action="/openid/confirm">');
  });

  it('should escape the realm on the confirmation page', async () => {
    const { handlers, profiles } = setup();
    profiles.login('sid-1', ALICE);

    const response = await handlers.entryPoint(buildEvent({
      query: checkidParams({ 'openid.realm': 'https://<b>.example.org' }),
      cookies: ['__Host-sid=sid-1'],
    }));

    expect(response.body).toContain('<h1>Sign in to https://&lt;b&gt;.example.org?</h1>');
  });

  it('should answer an unapproved checkid_immediate with setup_needed', async () => {
    const { handlers } = setup();

    const response = await handlers.entryPoint(buildEvent({
      query: checkidParams({ 'openid.mode': 'checkid_immediate' }),
      cookies: ['__Host-sid=sid-1'],
    }));

    expect(response.statusCode).toBe(302);
    expect(locationParams(response).get('openid.mode')).toBe('setup_needed');
  });

  it('should answer a checkid request without realm or return_to with 400', async () => {
    const { handlers } = setup();

    const response = await handlers.entryPoint(buildEvent({ query: { 'openid.mode': 'checkid_setup' } }));

    expect(response.statusCode).toBe(400);
    expect(response.body).toContain('error_code:invalid_request\n');
  });

  it('should reject other HTTP methods', async () => {
    const { handlers } = setup();

    const response = await handlers.entryPoint(buildEvent({ method: 'PUT' }));

    expect(response.statusCode).toBe(405);
    expect(header(response, 'Allow')).toBe('GET, POST');
  });
});
