/**
 * OpenID 2.0 Associations - Session Negotiation
 *
 * Supported combinations (OpenID 2.0 Section 8.3 and 8.4):
 *
 * | assoc_type  | session_type                 |
 * |-------------|------------------------------|
 * | HMAC-SHA1   | no-encryption, DH-SHA1       |
 * | HMAC-SHA256 | no-encryption, DH-SHA256     |
 *
 * @module openid2_association/diffie-hellman
 * @see https://openid.net/specs/openid-authentication-2_0.html#assoc_sess_types
 */

import {
    AssociationTypes,
    DEFAULT_DH_GENERATOR,
    DEFAULT_DH_MODULUS,
    ErrorMessages,
    MessageError,
    SessionTypes,
    btwocToBase64,
    createKeyExchange,
    xorSecret,
    type HashAlgorithm,
    type OpenIdMessage,
} from '@openid-provider/shared';
import type { AssociationType, KeyTransport, Negotiation } from './types';

const MAC_ALGORITHMS: Record<AssociationType, HashAlgorithm> = {
    [AssociationTypes.HMAC_SHA1]: 'sha1',
    [AssociationTypes.HMAC_SHA256]: 'sha256',
};

const DH_HASHES: Record<string, HashAlgorithm> = {
    [SessionTypes.DH_SHA1]: 'sha1',
    [SessionTypes.DH_SHA256]: 'sha256',
};

export function isAssociationType(value: string | undefined): value is AssociationType {
    return value === AssociationTypes.HMAC_SHA1 || value === AssociationTypes.HMAC_SHA256;
}

export function macAlgorithmOf(assocType: AssociationType): HashAlgorithm {
    return MAC_ALGORITHMS[assocType];
}

/**
 * Check an assoc_type / session_type pair.
 */
export function negotiate(assocType: string | undefined, sessionType: string): Negotiation {
    if (!isAssociationType(assocType)) {
        return { supported: false };
    }
    const macAlgorithm = macAlgorithmOf(assocType);
    if (sessionType === SessionTypes.NO_ENCRYPTION || DH_HASHES[sessionType] === macAlgorithm) {
        return { supported: true, assocType, macAlgorithm };
    }
    return { supported: false };
}

/**
 * Read the key transport of an associate request whose session type was
 * already negotiated.
 *
 * @throws MessageError when a DH session lacks or garbles its parameters
 */
export function readKeyTransport(request: OpenIdMessage, sessionType: string): KeyTransport {
    const hash = DH_HASHES[sessionType];
    if (!hash) {
        return { kind: 'plain' };
    }

    const consumerPublic = request.get('dh_consumer_public');
    if (!consumerPublic) {
        throw new MessageError(ErrorMessages.MISSING_DH_PUBLIC);
    }

    return {
        kind: 'diffie-hellman',
        hash,
        modulus: decodeBtwoc(request.get('dh_modulus') ?? DEFAULT_DH_MODULUS),
        generator: decodeBtwoc(request.get('dh_gen') ?? DEFAULT_DH_GENERATOR),
        consumerPublic: decodeBtwoc(consumerPublic),
    };
}

/**
 * Fields that carry the MAC key in the associate response:
 * `mac_key`, or `dh_server_public` and `enc_mac_key`.
 *
 * @throws MessageError when the DH exchange fails
 */
export function keyTransportFields(transport: KeyTransport, macKey: Buffer): Record<string, string> {
    if (transport.kind === 'plain') {
        return { mac_key: macKey.toString('base64') };
    }

    try {
        const dh = createKeyExchange(transport.modulus, transport.generator);
        const encrypted = xorSecret(dh, transport.consumerPublic, macKey, transport.hash);
        return {
            dh_server_public: btwocToBase64(dh.getPublicKey()),
            enc_mac_key: encrypted.toString('base64'),
        };
    } catch (err) {
        throw new MessageError(ErrorMessages.INVALID_DH_PARAMETERS, { cause: err });
    }
}

function decodeBtwoc(value: string): Buffer {
    const decoded = Buffer.from(value, 'base64');
    if (decoded.length === 0) {
        throw new MessageError(ErrorMessages.INVALID_DH_PARAMETERS);
    }
    return decoded;
}
