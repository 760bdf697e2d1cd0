/**
 * OpenID Provider - Base DynamoDB Schema Types
 *
 * Foundation interfaces for Single Table Design.
 * All entity types extend BaseItem for consistent key structure.
 *
 * Key Design:
 * - PK (Partition Key): Entity-specific prefix pattern (e.g., ASSOCIATION#<handle>)
 * - SK (Sort Key): always METADATA for the entities stored here
 *
 * TTL Strategy:
 * - Associations: TTL set to association expiry
 * - Conversations: TTL set to the browser session lifetime
 * - Authenticated sessions: TTL written by the login subsystem
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 * @see https://docs.aws.amazon.com/amazondynamodb/latest/developerguide/TTL.html
 */

// =============================================================================
// Key Pattern Prefixes (Strict Typing)
// =============================================================================

/** Partition Key prefixes for each entity type */
export type PKPrefix =
    | `ASSOCIATION#${string}`
    | `OPENID_CONVERSATION#${string}`
    | `AUTH_SESSION#${string}`;

/** Sort Key values */
export type SKValue = 'METADATA';

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType =
    | 'ASSOCIATION'
    | 'OPENID_CONVERSATION'
    | 'AUTH_SESSION';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items in the Single Table Design.
 */
export interface BaseItem {
    /** Partition Key - Entity-specific prefix pattern */
    PK: string;
    /** Sort Key - Entity type identifier */
    SK: SKValue;
    /** TTL for automatic expiration (Unix epoch seconds) */
    ttl?: number;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** ISO 8601 creation timestamp */
    createdAt: string;
    /** ISO 8601 last update timestamp */
    updatedAt: string;
}
