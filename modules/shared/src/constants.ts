/**
 * OpenID Provider - Protocol Constants
 *
 * Centralized constants for the OpenID Authentication 2.0 provider.
 *
 * Design Principles:
 * - Protocol-level constants that don't change between environments
 * - Runtime configuration (URLs, lifetimes) comes from environment variables
 * - All values are immutable (as const) for type safety
 *
 * @see https://openid.net/specs/openid-authentication-2_0.html
 * @see https://openid.net/specs/openid-attribute-exchange-1_0.html
 */

// =============================================================================
// Namespaces
// =============================================================================

/** openid.ns value of every OpenID 2.0 message */
export const OPENID2_NS = 'http://specs.openid.net/auth/2.0';

/** Attribute Exchange 1.0 extension namespace */
export const AX_NS = 'http://openid.net/srv/ax/1.0';

/** Alias under which the provider attaches its AX response */
export const AX_RESPONSE_ALIAS = 'ax';

/** Prefix of every protocol parameter in indirect messages */
export const OPENID_PREFIX = 'openid.';

// =============================================================================
// Message Modes
// =============================================================================

/**
 * Request modes handled by the protocol endpoint.
 *
 * @see OpenID 2.0 Section 8 (associate), 9 (checkid_*), 11.4.2 (check_authentication)
 */
export const RequestModes = {
    ASSOCIATE: 'associate',
    CHECKID_SETUP: 'checkid_setup',
    CHECKID_IMMEDIATE: 'checkid_immediate',
    CHECK_AUTHENTICATION: 'check_authentication',
} as const;

export type RequestMode = typeof RequestModes[keyof typeof RequestModes];

/** Modes of the indirect responses sent back to the relying party */
export const ResponseModes = {
    ID_RES: 'id_res',
    SETUP_NEEDED: 'setup_needed',
    CANCEL: 'cancel',
    ERROR: 'error',
} as const;

export type ResponseMode = typeof ResponseModes[keyof typeof ResponseModes];

// =============================================================================
// Associations
// =============================================================================

export const AssociationTypes = {
    HMAC_SHA1: 'HMAC-SHA1',
    HMAC_SHA256: 'HMAC-SHA256',
} as const;

export const SessionTypes = {
    NO_ENCRYPTION: 'no-encryption',
    DH_SHA1: 'DH-SHA1',
    DH_SHA256: 'DH-SHA256',
} as const;

/**
 * Default Diffie-Hellman modulus (base64 btwoc), used when the relying party
 * omits openid.dh_modulus.
 *
 * @see OpenID 2.0 Section 8.1.2
 */
export const DEFAULT_DH_MODULUS =
    'ANz5OguIOXLsDhmYmsWizjEOHTdxfo2Vcbt2I3MYZuYe91ouJ4mLBX+YkcLiemOcPym2CBRYHNOyyjmG0mg3BVd9RcLn5S3IHHoXGHblzqdLFEi/368Ygo79JRnxTkXjgmY0rxlJ5bU1zIKaSDuKdiI+XUkKJX8Fvf8W8vsixYOr';

/** Default Diffie-Hellman generator (base64 btwoc of 2) */
export const DEFAULT_DH_GENERATOR = 'Ag==';

/** Fields that every positive assertion signs */
export const REQUIRED_SIGNED_FIELDS = [
    'op_endpoint',
    'return_to',
    'response_nonce',
    'assoc_handle',
] as const;

// =============================================================================
// Attribute Exchange Type URIs
// =============================================================================

export const AxTypes = {
    EMAIL: 'http://axschema.org/contact/email',
    EMAIL_LEGACY: 'http://schema.openid.net/contact/email',
    FRIENDLY_NAME: 'http://axschema.org/namePerson/friendly',
} as const;

export type AxType = typeof AxTypes[keyof typeof AxTypes];

// =============================================================================
// Storage Keys
// =============================================================================

export const EntityTypes = {
    ASSOCIATION: 'ASSOCIATION',
    OPENID_CONVERSATION: 'OPENID_CONVERSATION',
    AUTH_SESSION: 'AUTH_SESSION',
} as const;

export const KeyPrefixes = {
    ASSOCIATION: 'ASSOCIATION#',
    OPENID_CONVERSATION: 'OPENID_CONVERSATION#',
    AUTH_SESSION: 'AUTH_SESSION#',
} as const;

// =============================================================================
// HTTP
// =============================================================================

export const HttpHeaders = {
    CONTENT_TYPE: 'Content-Type',
    LOCATION: 'Location',
    SET_COOKIE: 'Set-Cookie',
} as const;

/** Content type of direct (key-value form) responses */
export const KEY_VALUE_CONTENT_TYPE = 'text/plain; charset=utf-8';

/** Default session cookie name */
export const DEFAULT_SESSION_COOKIE_NAME = '__Host-sid';
