/**
 * MSG-01: Protocol Message Encoding
 *
 * Key-Value Form for direct messages, query parameters for indirect ones.
 */

import { describe, it, expect } from 'vitest';
import { MessageError, OpenIdMessage, toBtwoc } from '@openid-provider/shared';

describe('MSG-01: Protocol Message Encoding', () => {
  describe('Key-Value Form', () => {
    it('should encode one line per field in insertion order', () => {
      const message = OpenIdMessage.create().set('is_valid', 'true');

      expect(message.toKeyValueForm()).toBe('ns:http://specs.openid.net/auth/2.0\nis_valid:true\n');
    });

    it('should encode only the requested keys, in the requested order', () => {
      const message = OpenIdMessage.create().set('a', '1').set('b', '2');

      expect(message.toKeyValueForm(['b', 'a'])).toBe('b:2\na:1\n');
    });

    it('should refuse a requested key the message does not carry', () => {
      expect(() => OpenIdMessage.create().toKeyValueForm(['missing'])).toThrow(MessageError);
    });

    it('should refuse a value containing a newline', () => {
      const message = new OpenIdMessage().set('error', 'line one\nline two');

      expect(() => message.toKeyValueForm()).toThrow('Field cannot be encoded in key-value form: error');
    });
  });

  describe('Indirect messages', () => {
    it('should read openid.* parameters and ignore the rest', () => {
      const message = OpenIdMessage.fromParameters({ 'openid.mode': 'checkid_setup', state: 'x' });

      expect(message.toRecord()).toEqual({ mode: 'checkid_setup' });
      expect(message.toParameters()).toEqual({ 'openid.mode': 'checkid_setup' });
    });

    it('should append fields to return_to and keep its own query', () => {
      const message = OpenIdMessage.create()
        .set('mode', 'id_res')
        .set('return_to', 'https://ci.example.org/finish?from=%2Fjob');

      expect(message.getDestinationUrl()).toBe(
        'https://ci.example.org/finish?from=%2Fjob' +
          '&openid.ns=http%3A%2F%2Fspecs.openid.net%2Fauth%2F2.0' +
          '&openid.mode=id_res' +
          '&openid.return_to=https%3A%2F%2Fci.example.org%2Ffinish%3Ffrom%3D%252Fjob'
      );
    });

    it('should refuse a destination that is not an absolute URL', () => {
      const message = OpenIdMessage.create().set('return_to', '/relative');

      expect(() => message.getDestinationUrl()).toThrow(MessageError);
    });

    it('should refuse a message without a destination', () => {
      expect(() => OpenIdMessage.create().getDestinationUrl()).toThrow('Message has no return_to');
    });
  });

  describe('Extensions', () => {
    it('should find an extension under any alias', () => {
      const message = OpenIdMessage.fromParameters({
        'openid.ns.sreg': 'http://openid.net/extensions/sreg/1.1',
        'openid.sreg.required': 'email',
        'openid.ns.ext1': 'http://openid.net/srv/ax/1.0',
        'openid.ext1.mode': 'fetch_request',
      });

      expect(message.getExtensionAlias('http://openid.net/srv/ax/1.0')).toBe('ext1');
      expect(message.getExtension('http://openid.net/srv/ax/1.0')).toEqual({ mode: 'fetch_request' });
      expect(message.getExtension('http://example.com/none')).toBeUndefined();
    });
  });

  describe('btwoc', () => {
    it('should prefix a zero byte when the high bit is set', () => {
      expect([...toBtwoc(Buffer.from([0x80, 0x01]))]).toEqual([0x00, 0x80, 0x01]);
    });

    it('should strip redundant leading zeros', () => {
      expect([...toBtwoc(Buffer.from([0x00, 0x00, 0x7f]))]).toEqual([0x7f]);
      expect([...toBtwoc(Buffer.from([0x00]))]).toEqual([0x00]);
    });
  });
});
