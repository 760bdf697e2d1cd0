/**
 * OpenID Provider - Audit Logger
 *
 * Structured JSON logging to CloudWatch.
 * Implements the AuditLogger interface from shared_types/audit.d.ts.
 *
 * Design Principles:
 * - All audit events are JSON-formatted for CloudWatch Logs Insights queries
 * - Every identity disclosure produces an audit entry
 * - Request context (requestId, IP) is captured for traceability
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AssertionDetails,
    AuditActor,
    AuditLogger as IAuditLogger,
    StrictAuditInput,
} from '../../shared_types/audit';

// =============================================================================
// Request Context Interface
// =============================================================================

export interface AuditContext {
    /** AWS Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
    /** User agent string */
    userAgent?: string;
}

// =============================================================================
// Audit Logger Implementation
// =============================================================================

/**
 * AuditLogger writes one JSON line per audit event to stdout
 * (which Lambda routes to CloudWatch).
 */
export class AuditLogger implements IAuditLogger {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    /**
     * Log a strictly-typed audit event.
     */
    logStrict(entry: StrictAuditInput): void {
        const logEntry = {
            level: 'AUDIT' as const,
            timestamp: new Date().toISOString(),
            requestId: entry.requestId || this.context.requestId,
            action: entry.action,
            ip: entry.ip || this.context.ip,
            actor: entry.actor,
            ...(this.context.userAgent && { userAgent: this.context.userAgent }),
            details: entry.details,
        };

        console.log(JSON.stringify(logEntry));
    }

    // ---------------------------------------------------------------------------
    // Convenience Methods
    // ---------------------------------------------------------------------------

    /**
     * Log an association request, established or refused.
     */
    associated(details: { assocType: string; sessionType: string; established: boolean }): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'OPENID_ASSOCIATED',
            ip: this.context.ip,
            actor: { type: 'ANONYMOUS' },
            details,
        });
    }

    /**
     * Log a realm approval by the logged-in user.
     */
    realmApproved(actor: AuditActor, details: { realm: string; identity: string }): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'OPENID_REALM_APPROVED',
            ip: this.context.ip,
            actor,
            details,
        });
    }

    /**
     * Log a positive assertion sent to a relying party.
     */
    assertionIssued(actor: AuditActor, details: AssertionDetails): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'OPENID_ASSERTION_ISSUED',
            ip: this.context.ip,
            actor,
            details,
        });
    }

    /**
     * Log a negative assertion (setup_needed or cancel) sent to a relying party.
     */
    assertionDenied(details: AssertionDetails): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'OPENID_ASSERTION_DENIED',
            ip: this.context.ip,
            actor: { type: 'RELYING_PARTY', realm: details.realm },
            details,
        });
    }

    /**
     * Log a check_authentication answer.
     */
    assertionVerified(details: { assocHandle: string; valid: boolean }): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'OPENID_ASSERTION_VERIFIED',
            ip: this.context.ip,
            actor: { type: 'ANONYMOUS' },
            details,
        });
    }

    /**
     * Log the end of a browser session.
     */
    logout(actor: AuditActor, details: { sessionId: string }): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'LOGOUT',
            ip: this.context.ip,
            actor,
            details,
        });
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const auditLogger = withContext(event, context);
 *   auditLogger.assertionVerified({ assocHandle: 'h1', valid: true });
 * };
 * ```
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): AuditLogger {
    // Extract IP from HTTP API v2 format (headers are lowercase)
    const forwardedFor = event.headers?.['x-forwarded-for'];
    const ip = forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';

    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';

    const userAgent = event.headers?.['user-agent'];

    return new AuditLogger({
        requestId,
        ip,
        userAgent,
    });
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

/** Log levels for structured logging */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * General-purpose structured logger for non-audit events.
 */
export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

/**
 * Create a Logger from API Gateway HTTP API v2 event context.
 */
export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): Logger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        'unknown';

    return new Logger(requestId);
}
