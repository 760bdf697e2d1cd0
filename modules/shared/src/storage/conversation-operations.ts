/**
 * OpenID Provider - Conversation Storage Operations
 *
 * DynamoDB operations for OpenID conversation entities.
 *
 * Key Pattern:
 *   PK: OPENID_CONVERSATION#<session_id>
 *   SK: METADATA
 *
 * Lifecycle:
 *   1. Written by the protocol endpoint on the first OpenID request of a session
 *   2. Rewritten after every request that changed it (parameters, approvals)
 *   3. Deleted on logout, otherwise expired by TTL with the browser session
 *
 * Writes are whole-item puts: a conversation belongs to one browser session,
 * so there is no concurrent writer to guard against.
 *
 * @module storage/conversation-operations
 */

import { DynamoDBDocumentClient, GetCommand, PutCommand, DeleteCommand } from '@aws-sdk/lib-dynamodb';
import type { ConversationItem, ConversationRecord } from '../../../shared_types/conversation';
import { EntityTypes, KeyPrefixes } from '../constants';
import { isConversationItem } from '../type-guards';
import { withRetry } from './retry';
import { epochSeconds } from './types';

function conversationKey(sessionId: string) {
    return { PK: `${KeyPrefixes.OPENID_CONVERSATION}${sessionId}`, SK: 'METADATA' } as const;
}

/**
 * Retrieve the conversation of a browser session.
 *
 * @returns ConversationRecord, or null if absent or expired
 */
export async function getConversation(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionId: string
): Promise<ConversationRecord | null> {
    const result = await withRetry(() =>
        client.send(
            new GetCommand({
                TableName: tableName,
                Key: conversationKey(sessionId),
            })
        )
    );

    const item = result.Item;
    if (!isConversationItem(item)) {
        return null;
    }

    // TTL deletion lags behind expiry
    if (item.ttl && item.ttl < epochSeconds()) {
        return null;
    }

    return {
        sessionId: item.sessionId,
        requestParameters: item.requestParameters,
        mode: item.mode,
        realm: item.realm,
        returnTo: item.returnTo,
        approvedRealms: item.approvedRealms,
        identity: item.identity,
        authenticatedUser: item.authenticatedUser,
    };
}

/**
 * Save a conversation, refreshing its TTL.
 */
export async function saveConversation(
    client: DynamoDBDocumentClient,
    tableName: string,
    conversation: ConversationRecord,
    ttlSeconds: number
): Promise<void> {
    const now = new Date();
    const item: ConversationItem = {
        ...conversationKey(conversation.sessionId),
        entityType: EntityTypes.OPENID_CONVERSATION,
        ...conversation,
        ttl: epochSeconds(now) + ttlSeconds,
        createdAt: now.toISOString(),
        updatedAt: now.toISOString(),
    };

    await withRetry(() =>
        client.send(
            new PutCommand({
                TableName: tableName,
                Item: item,
            })
        )
    );
}

/**
 * Delete the conversation of a browser session. Deleting an absent item is not an error.
 */
export async function deleteConversation(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionId: string
): Promise<void> {
    await withRetry(() =>
        client.send(
            new DeleteCommand({
                TableName: tableName,
                Key: conversationKey(sessionId),
            })
        )
    );
}
