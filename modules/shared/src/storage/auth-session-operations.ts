/**
 * OpenID Provider - Authenticated Session Storage Operations
 *
 * Read and delete access to the sessions the login subsystem writes after a
 * successful directory bind. The provider never creates them.
 *
 * Key Pattern:
 *   PK: AUTH_SESSION#<session_id>
 *   SK: METADATA
 *
 * @module storage/auth-session-operations
 */

import { DynamoDBDocumentClient, GetCommand, DeleteCommand } from '@aws-sdk/lib-dynamodb';
import type { AuthenticatedSessionItem } from '../../../shared_types/auth-session';
import { KeyPrefixes } from '../constants';
import { isAuthenticatedSessionItem } from '../type-guards';
import { withRetry } from './retry';
import { epochSeconds } from './types';

function authSessionKey(sessionId: string) {
    return { PK: `${KeyPrefixes.AUTH_SESSION}${sessionId}`, SK: 'METADATA' } as const;
}

/**
 * Fetch an authenticated session.
 *
 * @returns the session, or null if absent or expired
 */
export async function getAuthenticatedSession(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionId: string
): Promise<AuthenticatedSessionItem | null> {
    const result = await withRetry(() =>
        client.send(
            new GetCommand({
                TableName: tableName,
                Key: authSessionKey(sessionId),
            })
        )
    );

    const item = result.Item;
    if (!isAuthenticatedSessionItem(item)) {
        return null;
    }

    if (item.ttl && item.ttl < epochSeconds()) {
        return null;
    }

    return item;
}

export async function deleteAuthenticatedSession(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionId: string
): Promise<void> {
    await withRetry(() =>
        client.send(
            new DeleteCommand({
                TableName: tableName,
                Key: authSessionKey(sessionId),
            })
        )
    );
}
