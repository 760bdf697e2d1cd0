/**
 * OpenID Provider - Association Storage Operations
 *
 * DynamoDB operations for association entities.
 *
 * Key Pattern:
 *   PK: ASSOCIATION#<assoc_handle>
 *   SK: METADATA
 *
 * TTL is the association expiry, so DynamoDB removes expired secrets.
 *
 * @module storage/association-operations
 */

import { DynamoDBDocumentClient, GetCommand, PutCommand, DeleteCommand } from '@aws-sdk/lib-dynamodb';
import type { AssociationItem, AssociationRecord } from '../../../shared_types/association';
import { EntityTypes, KeyPrefixes } from '../constants';
import { isAssociationItem } from '../type-guards';
import { withRetry } from './retry';
import { epochSeconds } from './types';

function associationKey(handle: string) {
    return { PK: `${KeyPrefixes.ASSOCIATION}${handle}`, SK: 'METADATA' } as const;
}

/**
 * Retrieve an association by handle.
 *
 * @returns AssociationRecord, or null if absent or malformed
 */
export async function getAssociation(
    client: DynamoDBDocumentClient,
    tableName: string,
    handle: string
): Promise<AssociationRecord | null> {
    const result = await withRetry(() =>
        client.send(
            new GetCommand({
                TableName: tableName,
                Key: associationKey(handle),
                ConsistentRead: true,
            })
        )
    );

    const item = result.Item;
    if (!isAssociationItem(item)) {
        return null;
    }

    return {
        handle: item.handle,
        type: item.type,
        macKey: item.macKey,
        private: item.private,
        expiresAt: item.expiresAt,
    };
}

/**
 * Save a new association. Handles are random, so the put never overwrites.
 */
export async function saveAssociation(
    client: DynamoDBDocumentClient,
    tableName: string,
    association: AssociationRecord
): Promise<void> {
    const now = new Date().toISOString();
    const item: AssociationItem = {
        ...associationKey(association.handle),
        entityType: EntityTypes.ASSOCIATION,
        ...association,
        ttl: epochSeconds(new Date(association.expiresAt)),
        createdAt: now,
        updatedAt: now,
    };

    await withRetry(() =>
        client.send(
            new PutCommand({
                TableName: tableName,
                Item: item,
                ConditionExpression: 'attribute_not_exists(PK)',
            })
        )
    );
}

export async function deleteAssociation(
    client: DynamoDBDocumentClient,
    tableName: string,
    handle: string
): Promise<void> {
    await withRetry(() =>
        client.send(
            new DeleteCommand({
                TableName: tableName,
                Key: associationKey(handle),
            })
        )
    );
}
