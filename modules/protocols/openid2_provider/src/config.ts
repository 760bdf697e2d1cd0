/**
 * OpenID 2.0 Provider - Configuration
 *
 * Centralized environment configuration with validation.
 * All configuration values are injected via Terraform environment variables.
 */

import { DEFAULT_SESSION_COOKIE_NAME } from '@openid-provider/shared';
import type { ProviderEnvConfig } from './types';

// =============================================================================
// Configuration Defaults
// =============================================================================

const DEFAULTS = {
    CONFIRM_URL: '/openid/confirm',
    SESSION_COOKIE_NAME: DEFAULT_SESSION_COOKIE_NAME,
    CONVERSATION_TTL_SECONDS: 86400, // 24 hours
    ASSOCIATION_LIFETIME_SECONDS: 3600, // 1 hour
} as const;

// =============================================================================
// Environment Validation
// =============================================================================

/**
 * Validates that a required environment variable is present.
 * @throws Error if the variable is missing
 */
function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

/**
 * Gets an optional positive integer environment variable with a default value.
 */
function optionalNumericEnv(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed <= 0) {
        throw new Error(`Invalid numeric value for ${name}: ${value}`);
    }
    return parsed;
}

// =============================================================================
// Configuration Loader
// =============================================================================

let configCache: ProviderEnvConfig | null = null;

/**
 * Load and validate configuration.
 * Configuration is cached after first load for Lambda warm starts.
 */
export function getProviderConfig(): ProviderEnvConfig {
    if (configCache) {
        return configCache;
    }

    configCache = {
        tableName: requireEnv('TABLE_NAME'),
        baseUrl: requireEnv('BASE_URL'),
        opEndpointUrl: requireEnv('OP_ENDPOINT_URL'),
        loginRouterUrl: requireEnv('LOGIN_ROUTER_URL'),
        confirmUrl: optionalEnv('CONFIRM_URL', DEFAULTS.CONFIRM_URL),
        csrfSecret: requireEnv('CSRF_SECRET'),
        sessionCookie: {
            name: optionalEnv('SESSION_COOKIE_NAME', DEFAULTS.SESSION_COOKIE_NAME),
            domain: process.env.SESSION_COOKIE_DOMAIN || undefined,
        },
        conversationTtlSeconds: optionalNumericEnv('CONVERSATION_TTL_SECONDS', DEFAULTS.CONVERSATION_TTL_SECONDS),
        associationLifetimeSeconds: optionalNumericEnv(
            'ASSOCIATION_LIFETIME_SECONDS',
            DEFAULTS.ASSOCIATION_LIFETIME_SECONDS
        ),
    };

    return configCache;
}

/**
 * Clear configuration cache (useful for testing).
 */
export function clearConfigCache(): void {
    configCache = null;
}
