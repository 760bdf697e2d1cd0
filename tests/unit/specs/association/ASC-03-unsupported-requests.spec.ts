/**
 * ASC-03: Unsupported Association Requests
 */

import { describe, it, expect } from 'vitest';
import { MessageError } from '@openid-provider/shared';
import { negotiate } from '@openid-provider/openid2-association';
import { InMemoryAssociationStore } from '../../support/in-memory';
import { createAssociationService } from '../../support/fixtures';

describe('ASC-03: Unsupported Association Requests', () => {
  it('should answer a mismatched pair with unsupported-type', async () => {
    const store = new InMemoryAssociationStore();
    const service = createAssociationService(store);

    const response = await service.associationResponse({
      'openid.mode': 'associate',
      'openid.assoc_type': 'HMAC-SHA1',
      'openid.session_type': 'DH-SHA256',
    });

    expect(response.toKeyValueForm()).toBe(
      'ns:http://specs.openid.net/auth/2.0\n' +
        'error:Unsupported association or session type\n' +
        'error_code:unsupported-type\n' +
        'session_type:DH-SHA256\n' +
        'assoc_type:HMAC-SHA256\n'
    );
    expect(store.items.size).toBe(0);
  });

  it('should answer an unknown assoc_type with unsupported-type', async () => {
    const service = createAssociationService();

    const response = await service.associationResponse({
      'openid.mode': 'associate',
      'openid.assoc_type': 'HMAC-MD5',
      'openid.session_type': 'no-encryption',
    });

    expect(response.get('error_code')).toBe('unsupported-type');
  });

  it('should reject a DH session without the consumer public key', async () => {
    const service = createAssociationService();

    const attempt = service.associationResponse({
      'openid.mode': 'associate',
      'openid.assoc_type': 'HMAC-SHA256',
      'openid.session_type': 'DH-SHA256',
    });

    await expect(attempt).rejects.toThrow(MessageError);
    await expect(attempt).rejects.toThrow('Missing required parameter: openid.dh_consumer_public');
  });

  it('should pair each MAC with its own DH hash', () => {
    expect(negotiate('HMAC-SHA256', 'DH-SHA256')).toEqual({
      supported: true,
      assocType: 'HMAC-SHA256',
      macAlgorithm: 'sha256',
    });
    expect(negotiate('HMAC-SHA1', 'no-encryption')).toMatchObject({ supported: true });
    expect(negotiate('HMAC-SHA256', 'DH-SHA1')).toEqual({ supported: false });
    expect(negotiate(undefined, 'no-encryption')).toEqual({ supported: false });
  });
});
