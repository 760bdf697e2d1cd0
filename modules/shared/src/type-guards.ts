/**
 * OpenID Provider - Type Guards
 *
 * Runtime type guards for DynamoDB entity discrimination.
 * Items read from the table are untyped; these guards narrow them safely.
 *
 * Each guard validates:
 * - entityType discriminator matches expected value
 * - PK prefix matches expected pattern
 * - SK value is METADATA
 * - the fields the provider reads have the expected primitive types
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import type { AssociationItem } from '../../shared_types/association';
import type { AuthenticatedSessionItem } from '../../shared_types/auth-session';
import type { ConversationItem } from '../../shared_types/conversation';
import { EntityTypes, KeyPrefixes } from './constants';

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function hasKeys(item: Record<string, unknown>, entityType: string, prefix: string): boolean {
    const pk = item.PK;
    return item.entityType === entityType && typeof pk === 'string' && pk.startsWith(prefix) && item.SK === 'METADATA';
}

function isStringRecord(value: unknown): value is Record<string, string> {
    return isObject(value) && Object.values(value).every(v => typeof v === 'string');
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isProfile(value: unknown): boolean {
    return isObject(value) && typeof value.userIdentifier === 'string' && typeof value.email === 'string';
}

/**
 * Check if an item is an AssociationItem.
 * Key Pattern: PK=ASSOCIATION#<handle>, SK=METADATA
 */
export function isAssociationItem(item: unknown): item is AssociationItem {
    return (
        isObject(item) &&
        hasKeys(item, EntityTypes.ASSOCIATION, KeyPrefixes.ASSOCIATION) &&
        typeof item.handle === 'string' &&
        (item.type === 'HMAC-SHA1' || item.type === 'HMAC-SHA256') &&
        typeof item.macKey === 'string' &&
        typeof item.private === 'boolean' &&
        typeof item.expiresAt === 'string'
    );
}

/**
 * Check if an item is a ConversationItem.
 * Key Pattern: PK=OPENID_CONVERSATION#<session_id>, SK=METADATA
 */
export function isConversationItem(item: unknown): item is ConversationItem {
    return (
        isObject(item) &&
        hasKeys(item, EntityTypes.OPENID_CONVERSATION, KeyPrefixes.OPENID_CONVERSATION) &&
        typeof item.sessionId === 'string' &&
        isStringRecord(item.requestParameters) &&
        isStringArray(item.approvedRealms) &&
        (item.authenticatedUser === undefined || isProfile(item.authenticatedUser))
    );
}

/**
 * Check if an item is an AuthenticatedSessionItem.
 * Key Pattern: PK=AUTH_SESSION#<session_id>, SK=METADATA
 */
export function isAuthenticatedSessionItem(item: unknown): item is AuthenticatedSessionItem {
    return (
        isObject(item) &&
        hasKeys(item, EntityTypes.AUTH_SESSION, KeyPrefixes.AUTH_SESSION) &&
        typeof item.userIdentifier === 'string' &&
        typeof item.email === 'string'
    );
}
