/**
 * OpenID Provider - Storage Adapter Types
 *
 * @module storage/types
 */

/**
 * Configuration options for the StorageAdapter.
 */
export interface StorageAdapterConfig {
    /** DynamoDB table name (injected from environment) */
    tableName: string;
    /** AWS region (optional, defaults to environment) */
    region?: string;
    /** Lifetime of a conversation item, in seconds */
    conversationTtlSeconds: number;
}

/** Seconds since the Unix epoch, the unit of DynamoDB TTL attributes */
export function epochSeconds(date: Date = new Date()): number {
    return Math.floor(date.getTime() / 1000);
}
