/**
 * OpenID Provider - Storage Module
 *
 * DynamoDB operations, one file per entity. Handlers normally go through
 * StorageAdapter, which exposes them behind the repository ports.
 *
 * @module storage
 */

export type { StorageAdapterConfig } from './types';
export { epochSeconds } from './types';

export {
    withRetry,
    isRetryableError,
    calculateDelay,
    sleep,
    DEFAULT_RETRY_CONFIG,
    type RetryConfig,
} from './retry';

export { getConversation, saveConversation, deleteConversation } from './conversation-operations';

export { getAssociation, saveAssociation, deleteAssociation } from './association-operations';

export { getAuthenticatedSession, deleteAuthenticatedSession } from './auth-session-operations';
