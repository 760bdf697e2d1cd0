/**
 * OpenID Provider - Shared Utilities
 *
 * Central export for all shared modules used across Lambda functions.
 *
 * Architecture:
 * - This package is a shared dependency for the protocol modules
 * - No hardcoded configuration - all values come from environment variables
 * - Follows hexagonal architecture principles with clear port definitions
 *
 * Modules:
 * - Message: OpenID 2.0 message model and Key-Value Form codec
 * - Storage Adapter: DynamoDB Single Table Design operations
 * - Audit Logger: structured JSON logging to CloudWatch
 * - Response Helpers: direct, indirect and HTML responses
 * - Crypto: btwoc, Diffie-Hellman, HMAC signatures, CSRF tokens
 * - Constants: OpenID 2.0 and Attribute Exchange values
 * - Errors: ProtocolError / MessageError and error codes
 * - Type Guards: Runtime type discrimination for DynamoDB entities
 *
 * @see https://openid.net/specs/openid-authentication-2_0.html
 */

// =============================================================================
// Protocol Messages
// =============================================================================

export { OpenIdMessage } from './message';

// =============================================================================
// Storage Adapter
// =============================================================================

export { StorageAdapter, createStorageAdapter } from './dynamo-client';

export type { StorageAdapterConfig } from './dynamo-client';

// Re-export modular storage operations for direct use
export * as storage from './storage';

// =============================================================================
// Audit Logger
// =============================================================================

export { AuditLogger, Logger, withContext, createLogger } from './audit-logger';

export type { AuditContext, LogLevel } from './audit-logger';

// =============================================================================
// HTTP Helpers
// =============================================================================

export {
    // Direct responses
    keyValue,
    error,
    protocolError,
    serverError,
    methodNotAllowed,
    // Indirect responses
    redirect,
    seeOther,
    // HTML
    html,
    escapeHtml,
} from './response';

export type { StructuredResponse } from './response';

export {
    parseCookies,
    getSessionIdFromCookie,
    buildSessionCookieHeader,
    buildClearCookieHeader,
} from './cookies';

export { parseFormBody, parseRequestParameters } from './form-parser';

// =============================================================================
// Errors
// =============================================================================

export {
    OpenIdErrors,
    HttpStatus,
    ErrorMessages,
    ProtocolError,
    MessageError,
} from './errors/index';

export type { OpenIdErrorCode, HttpStatusCode } from './errors/index';

// =============================================================================
// Cryptographic Utilities
// =============================================================================

export {
    MAC_KEY_BYTES,
    toBtwoc,
    btwocToBase64,
    createKeyExchange,
    xorSecret,
    signKeyValue,
    signaturesMatch,
    generateSecureRandom,
    generateMacKey,
    generateAssociationHandle,
    generateResponseNonce,
    generateCsrfToken,
    verifyCsrfToken,
} from './crypto';

export type { HashAlgorithm } from './crypto';

// =============================================================================
// Constants
// =============================================================================

export {
    OPENID2_NS,
    AX_NS,
    AX_RESPONSE_ALIAS,
    OPENID_PREFIX,
    RequestModes,
    ResponseModes,
    AssociationTypes,
    SessionTypes,
    DEFAULT_DH_MODULUS,
    DEFAULT_DH_GENERATOR,
    REQUIRED_SIGNED_FIELDS,
    AxTypes,
    EntityTypes,
    KeyPrefixes,
    HttpHeaders,
    KEY_VALUE_CONTENT_TYPE,
    DEFAULT_SESSION_COOKIE_NAME,
} from './constants';

export type { RequestMode, ResponseMode, AxType } from './constants';

// =============================================================================
// Type Guards
// =============================================================================

export { isAssociationItem, isConversationItem, isAuthenticatedSessionItem } from './type-guards';

