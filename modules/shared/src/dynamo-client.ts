/**
 * OpenID Provider - DynamoDB Storage Adapter
 *
 * Implements the Single Table Design pattern for the provider's entities and
 * exposes them through the repository ports of shared_types/api.d.ts.
 *
 * Key Patterns:
 *   - Association:           PK=ASSOCIATION#<handle>            SK=METADATA
 *   - Conversation:          PK=OPENID_CONVERSATION#<sid>       SK=METADATA
 *   - Authenticated session: PK=AUTH_SESSION#<sid>              SK=METADATA
 *
 * Configuration:
 *   - TABLE_NAME: Injected via environment variable from Terraform
 *   - Region: Uses AWS SDK default (Lambda execution role region)
 *
 * TTL attributes enable automatic cleanup of expired conversations and
 * associations.
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

import type { AssociationStore, ConversationRepository, ProfileSource } from '../../shared_types/api';
import type { AssociationRecord } from '../../shared_types/association';
import type { AuthenticatedProfile } from '../../shared_types/auth-session';
import type { ConversationRecord } from '../../shared_types/conversation';

import type { StorageAdapterConfig } from './storage/types';
import * as associationOps from './storage/association-operations';
import * as conversationOps from './storage/conversation-operations';
import * as authSessionOps from './storage/auth-session-operations';

export type { StorageAdapterConfig } from './storage/types';

// =============================================================================
// Storage Adapter Class
// =============================================================================

/**
 * StorageAdapter provides typed access to the DynamoDB Single Table.
 * All methods enforce the correct key patterns and entity types.
 *
 * Each port is a separate property so a handler can pass exactly the
 * collaborator it needs.
 */
export class StorageAdapter {
    private readonly client: DynamoDBDocumentClient;
    private readonly tableName: string;
    private readonly conversationTtlSeconds: number;

    readonly associations: AssociationStore;
    readonly conversations: ConversationRepository;
    readonly profiles: ProfileSource;

    constructor(config: StorageAdapterConfig, client?: DynamoDBDocumentClient) {
        this.tableName = config.tableName;
        this.conversationTtlSeconds = config.conversationTtlSeconds;

        this.client =
            client ??
            DynamoDBDocumentClient.from(new DynamoDBClient({ region: config.region }), {
                marshallOptions: {
                    removeUndefinedValues: true,
                },
                unmarshallOptions: {
                    wrapNumbers: false,
                },
            });

        this.associations = {
            get: handle => this.getAssociation(handle),
            save: association => this.saveAssociation(association),
            remove: handle => this.deleteAssociation(handle),
        };
        this.conversations = {
            load: sessionId => this.getConversation(sessionId),
            save: conversation => this.saveConversation(conversation),
            remove: sessionId => this.deleteConversation(sessionId),
        };
        this.profiles = {
            getAuthenticatedProfile: sessionId => this.getAuthenticatedProfile(sessionId),
            invalidate: sessionId => this.deleteAuthenticatedSession(sessionId),
        };
    }

    // -------------------------------------------------------------------------
    // Association Operations
    // -------------------------------------------------------------------------

    async getAssociation(handle: string): Promise<AssociationRecord | null> {
        return associationOps.getAssociation(this.client, this.tableName, handle);
    }

    async saveAssociation(association: AssociationRecord): Promise<void> {
        return associationOps.saveAssociation(this.client, this.tableName, association);
    }

    async deleteAssociation(handle: string): Promise<void> {
        return associationOps.deleteAssociation(this.client, this.tableName, handle);
    }

    // -------------------------------------------------------------------------
    // Conversation Operations
    // -------------------------------------------------------------------------

    async getConversation(sessionId: string): Promise<ConversationRecord | null> {
        return conversationOps.getConversation(this.client, this.tableName, sessionId);
    }

    /**
     * Save a conversation; its TTL restarts from now.
     */
    async saveConversation(conversation: ConversationRecord): Promise<void> {
        return conversationOps.saveConversation(
            this.client,
            this.tableName,
            conversation,
            this.conversationTtlSeconds
        );
    }

    async deleteConversation(sessionId: string): Promise<void> {
        return conversationOps.deleteConversation(this.client, this.tableName, sessionId);
    }

    // -------------------------------------------------------------------------
    // Authenticated Session Operations
    // -------------------------------------------------------------------------

    /**
     * Profile of the user logged in under a browser session, or null.
     */
    async getAuthenticatedProfile(sessionId: string): Promise<AuthenticatedProfile | null> {
        const session = await authSessionOps.getAuthenticatedSession(this.client, this.tableName, sessionId);
        if (!session) {
            return null;
        }
        return { userIdentifier: session.userIdentifier, email: session.email };
    }

    async deleteAuthenticatedSession(sessionId: string): Promise<void> {
        return authSessionOps.deleteAuthenticatedSession(this.client, this.tableName, sessionId);
    }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a StorageAdapter instance.
 *
 * The AWS region is determined by the AWS SDK from the Lambda execution
 * environment.
 *
 * @example
 * ```typescript
 * const storage = createStorageAdapter({ tableName: config.tableName, conversationTtlSeconds: 86400 });
 * const conversation = await storage.conversations.load(sessionId);
 * ```
 */
export function createStorageAdapter(config: StorageAdapterConfig): StorageAdapter {
    if (!config.tableName) {
        throw new Error(
            'TABLE_NAME environment variable is required. ' +
            'Ensure the Lambda function is configured with the DynamoDB table name.'
        );
    }
    return new StorageAdapter(config);
}
