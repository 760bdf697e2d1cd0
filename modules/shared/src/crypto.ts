/**
 * OpenID Provider - Cryptographic Utilities
 *
 * Thin helpers over node:crypto for the OpenID 2.0 association and
 * signature machinery.
 *
 * Implementation Notes:
 * - Big integers travel as base64(btwoc(n)): big-endian two's complement,
 *   shortest form, per OpenID 2.0 Section 4.2
 * - Signatures are HMAC-SHA1 or HMAC-SHA256 over the Key-Value Form of the
 *   signed fields, base64 encoded
 * - All comparisons of secret-derived values are constant-time
 *
 * @see https://openid.net/specs/openid-authentication-2_0.html#btwoc
 * @see https://openid.net/specs/openid-authentication-2_0.html#generating_signatures
 */

import {
    createDiffieHellman,
    createHash,
    createHmac,
    randomBytes,
    timingSafeEqual,
    type DiffieHellman,
} from 'node:crypto';

// =============================================================================
// Constants
// =============================================================================

/** Default entropy bytes for secure random generation */
const DEFAULT_ENTROPY_BYTES = 32;

/** Hash used for CSRF tokens */
const CSRF_HASH_ALGORITHM = 'sha256';

export type HashAlgorithm = 'sha1' | 'sha256';

/** MAC key length is the digest length of the association's hash */
export const MAC_KEY_BYTES: Record<HashAlgorithm, number> = {
    sha1: 20,
    sha256: 32,
};

// =============================================================================
// btwoc Encoding
// =============================================================================

/**
 * Convert an unsigned big-endian integer to btwoc form.
 * Leading zero bytes are stripped, then a single 0x00 is prepended when the
 * high bit is set so the value reads as positive.
 */
export function toBtwoc(unsigned: Buffer): Buffer {
    let start = 0;
    while (start < unsigned.length - 1 && unsigned[start] === 0) {
        start++;
    }
    const trimmed = unsigned.subarray(start);
    if (trimmed.length > 0 && (trimmed[0] & 0x80) !== 0) {
        return Buffer.concat([Buffer.from([0]), trimmed]);
    }
    return Buffer.from(trimmed);
}

export function btwocToBase64(unsigned: Buffer): string {
    return toBtwoc(unsigned).toString('base64');
}

// =============================================================================
// Diffie-Hellman
// =============================================================================

/**
 * Create a key pair over the given modulus and generator (btwoc buffers).
 */
export function createKeyExchange(modulus: Buffer, generator: Buffer): DiffieHellman {
    const dh = createDiffieHellman(modulus, generator);
    dh.generateKeys();
    return dh;
}

/**
 * Encrypt (or decrypt) a MAC key for a DH session:
 * `H(btwoc(g^(xy) mod p)) XOR mac_key`.
 *
 * @see OpenID 2.0 Section 8.4.2
 */
export function xorSecret(
    dh: DiffieHellman,
    otherPublic: Buffer,
    macKey: Buffer,
    algorithm: HashAlgorithm
): Buffer {
    const shared = toBtwoc(dh.computeSecret(otherPublic));
    const hashed = createHash(algorithm).update(shared).digest();
    if (hashed.length !== macKey.length) {
        throw new Error(`MAC key length ${macKey.length} does not match ${algorithm}`);
    }

    const result = Buffer.alloc(macKey.length);
    for (let i = 0; i < macKey.length; i++) {
        result[i] = hashed[i] ^ macKey[i];
    }
    return result;
}

// =============================================================================
// Signatures
// =============================================================================

/**
 * HMAC over a Key-Value Form payload, base64 encoded.
 */
export function signKeyValue(payload: string, macKey: Buffer, algorithm: HashAlgorithm): string {
    return createHmac(algorithm, macKey).update(payload, 'utf8').digest('base64');
}

/**
 * Compare two base64 signatures in constant time.
 */
export function signaturesMatch(expected: string, actual: string): boolean {
    const a = Buffer.from(expected, 'utf-8');
    const b = Buffer.from(actual, 'utf-8');
    if (a.length !== b.length) {
        return false;
    }
    return timingSafeEqual(a, b);
}

// =============================================================================
// Secure Random Generation
// =============================================================================

/**
 * Generate a cryptographically secure random string.
 *
 * @param byteLength - Number of random bytes (default: 32)
 * @returns Base64url-encoded random string
 */
export function generateSecureRandom(byteLength = DEFAULT_ENTROPY_BYTES): string {
    return randomBytes(byteLength).toString('base64url');
}

export function generateMacKey(algorithm: HashAlgorithm): Buffer {
    return randomBytes(MAC_KEY_BYTES[algorithm]);
}

/**
 * Generate an association handle. Base64url output stays within the
 * printable ASCII range OpenID requires for handles.
 */
export function generateAssociationHandle(): string {
    return `${Date.now().toString(36)}.${generateSecureRandom(18)}`;
}

/**
 * Generate an openid.response_nonce: UTC second-resolution timestamp
 * followed by random characters.
 *
 * @example "2024-01-15T10:30:00Zq3Jx9v2KcA"
 *
 * @see OpenID 2.0 Section 10.1
 */
export function generateResponseNonce(now: Date = new Date()): string {
    const timestamp = now.toISOString().replace(/\.\d{3}Z$/, 'Z');
    return timestamp + generateSecureRandom(8);
}

// =============================================================================
// CSRF Tokens
// =============================================================================

/**
 * Generate a CSRF token bound to a browser session.
 * Deterministic for a given session/secret pair, so nothing is stored.
 *
 * @param sessionId - Session identifier to bind the token to
 * @param secret - Server-side secret for HMAC
 * @returns HMAC-SHA256 token (hex encoded, 64 characters)
 */
export function generateCsrfToken(sessionId: string, secret: string): string {
    return createHmac(CSRF_HASH_ALGORITHM, secret).update(sessionId).digest('hex');
}

/**
 * Verify a CSRF token using constant-time comparison.
 */
export function verifyCsrfToken(sessionId: string, token: string, secret: string): boolean {
    return signaturesMatch(generateCsrfToken(sessionId, secret), token);
}
