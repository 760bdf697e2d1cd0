/**
 * AXR-01: Attribute Exchange Fetch Response
 *
 * Recognized attributes are answered under the relying party's aliases,
 * attached under the `ax` alias and covered by the assertion's signature.
 */

import { describe, it, expect } from 'vitest';
import { AX_NS, OpenIdMessage } from '@openid-provider/shared';
import {
  ConversationState,
  attachFetchResponse,
  parseAxRequest,
  respond,
} from '@openid-provider/openid2-provider';
import {
  ALICE,
  AX_FETCH_PARAMS,
  checkidParams,
  createAssociationService,
  createProvider,
} from '../../support/fixtures';

describe('AXR-01: Attribute Exchange Fetch Response', () => {
  describe('parseAxRequest', () => {
    it('should read a fetch request under the relying party alias', () => {
      const request = parseAxRequest(OpenIdMessage.fromParameters(AX_FETCH_PARAMS));

      expect(request.kind).toBe('fetch');
      if (request.kind !== 'fetch') return;
      expect([...request.attributes]).toEqual([
        ['e', 'http://axschema.org/contact/email'],
        ['n', 'http://axschema.org/namePerson/friendly'],
        ['x', 'http://example.com/unknown'],
      ]);
    });

    it('should report a request without the AX namespace as none', () => {
      expect(parseAxRequest(OpenIdMessage.fromParameters(checkidParams()))).toEqual({ kind: 'none' });
    });

    it('should report other AX modes as unknown', () => {
      const message = OpenIdMessage.fromParameters({
        'openid.ns.ax': AX_NS,
        'openid.ax.mode': 'store_request',
      });

      expect(parseAxRequest(message)).toEqual({ kind: 'unknown', mode: 'store_request' });
    });
  });

  describe('respond', () => {
    it('should answer recognized attributes only', () => {
      const request = parseAxRequest(OpenIdMessage.fromParameters(AX_FETCH_PARAMS));
      if (request.kind !== 'fetch') throw new Error('expected a fetch request');

      expect(respond(request, ALICE)).toEqual([
        { alias: 'e', typeUri: 'http://axschema.org/contact/email', value: 'alice@example.org' },
        { alias: 'n', typeUri: 'http://axschema.org/namePerson/friendly', value: 'alice' },
      ]);
    });

    it('should answer the legacy email type URI', () => {
      const request = parseAxRequest(OpenIdMessage.fromParameters({
        'openid.ns.ax': AX_NS,
        'openid.ax.mode': 'fetch_request',
        'openid.ax.type.mail': 'http://schema.openid.net/contact/email',
      }));
      if (request.kind !== 'fetch') throw new Error('expected a fetch request');

      expect(respond(request, ALICE)).toEqual([
        { alias: 'mail', typeUri: 'http://schema.openid.net/contact/email', value: 'alice@example.org' },
      ]);
    });
  });

  describe('attachFetchResponse', () => {
    it('should attach the response under the ax alias and return its keys', () => {
      const message = OpenIdMessage.create();

      const keys = attachFetchResponse(message, [
        { alias: 'e', typeUri: 'http://axschema.org/contact/email', value: 'alice@example.org' },
      ]);

      expect(keys).toEqual(['ns.ax', 'ax.mode', 'ax.type.e', 'ax.value.e']);
      expect(message.get('ns.ax')).toBe(AX_NS);
      expect(message.get('ax.mode')).toBe('fetch_response');
      expect(message.get('ax.value.e')).toBe('alice@example.org');
    });
  });

  describe('assertion with attributes', () => {
    async function assertionWithAttributes(associations = createAssociationService()) {
      const provider = createProvider(associations);
      const conversation = ConversationState.create('sid-1');
      await provider.entryPoint(conversation, checkidParams(AX_FETCH_PARAMS));
      const result = await provider.confirm(conversation, ALICE);
      if (result.kind !== 'redirect') throw new Error('expected a redirect');
      return result.message;
    }

    it('should sign the attached attributes', async () => {
      const message = await assertionWithAttributes();

      expect(message.get('signed')).toBe(
        'op_endpoint,return_to,response_nonce,assoc_handle,claimed_id,identity,' +
          'ns.ax,ax.mode,ax.type.e,ax.value.e,ax.type.n,ax.value.n'
      );
      expect(message.get('ax.value.n')).toBe('alice');
      expect(message.has('ax.type.x')).toBe(false);
    });

    it('should verify through check_authentication', async () => {
      const associations = createAssociationService();
      const message = await assertionWithAttributes(associations);

      const params = { ...message.toParameters(), 'openid.mode': 'check_authentication' };
      const verification = await associations.verify(params);

      expect(verification.get('is_valid')).toBe('true');
    });
  });
});
