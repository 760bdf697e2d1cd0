/**
 * OpenID Provider - Audit Schema
 *
 * Structured audit logging interfaces.
 * All audit events are JSON-formatted for CloudWatch.
 *
 * This file defines the contract for the AuditLogger utility class.
 */

// =============================================================================
// Audit Actions
// =============================================================================

/**
 * Security-relevant events of the OpenID provider.
 */
export type AuditAction =
    | 'OPENID_ASSOCIATED'
    | 'OPENID_REALM_APPROVED'
    | 'OPENID_ASSERTION_ISSUED'
    | 'OPENID_ASSERTION_DENIED'
    | 'OPENID_ASSERTION_VERIFIED'
    | 'LOGOUT';

// =============================================================================
// Actor Types
// =============================================================================

/**
 * Represents the entity performing the audited action.
 * Relying parties are identified by their realm.
 */
export type AuditActor =
    | { type: 'USER'; sub: string }
    | { type: 'RELYING_PARTY'; realm: string }
    | { type: 'SYSTEM'; process?: string }
    | { type: 'ANONYMOUS' };

// =============================================================================
// Audit Log Entry
// =============================================================================

/**
 * Structured audit log entry for CloudWatch.
 *
 * @example
 * ```typescript
 * const entry: AuditLogEntry = {
 *   level: 'AUDIT',
 *   timestamp: '2024-01-15T10:30:00.000Z',
 *   requestId: 'abc123-def456-ghi789',
 *   action: 'OPENID_REALM_APPROVED',
 *   ip: '192.168.1.1',
 *   actor: { type: 'USER', sub: 'alice' },
 *   details: { realm: 'https://ci.example.org' }
 * };
 * ```
 */
export interface AuditLogEntry {
    /** Always 'AUDIT', separates audit entries from diagnostic logs */
    level: 'AUDIT';

    /** ISO 8601 UTC timestamp */
    timestamp: string;

    /** AWS Request ID for tracing, filled from context when omitted */
    requestId?: string;

    action: AuditAction;

    /** Source IP address, filled from context when omitted */
    ip?: string;

    actor: AuditActor;

    /** User agent of the request, when it sent one */
    userAgent?: string;

    /** Additional metadata specific to the action */
    details: Record<string, unknown>;
}

// =============================================================================
// Action-Specific Detail Types
// =============================================================================

/** Details for OPENID_ASSOCIATED */
export interface AssociatedDetails {
    assocType: string;
    sessionType: string;
    /** false when the request was answered with unsupported-type */
    established: boolean;
}

/** Details for OPENID_REALM_APPROVED */
export interface RealmApprovedDetails {
    realm: string;
    identity: string;
}

/** Details for OPENID_ASSERTION_ISSUED and OPENID_ASSERTION_DENIED */
export interface AssertionDetails {
    realm: string;
    returnTo: string;
    mode: 'checkid_setup' | 'checkid_immediate';
    identity?: string;
    /** AX aliases disclosed alongside the assertion */
    attributes?: string[];
}

/** Details for OPENID_ASSERTION_VERIFIED */
export interface VerificationDetails {
    assocHandle: string;
    valid: boolean;
}

/** Details for LOGOUT */
export interface LogoutDetails {
    sessionId: string;
}

// =============================================================================
// Strictly-Typed Audit Entry Variants
// =============================================================================

export interface AssociatedEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'OPENID_ASSOCIATED';
    details: AssociatedDetails;
}

export interface RealmApprovedEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'OPENID_REALM_APPROVED';
    details: RealmApprovedDetails;
}

export interface AssertionIssuedEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'OPENID_ASSERTION_ISSUED';
    details: AssertionDetails;
}

export interface AssertionDeniedEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'OPENID_ASSERTION_DENIED';
    details: AssertionDetails;
}

export interface AssertionVerifiedEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'OPENID_ASSERTION_VERIFIED';
    details: VerificationDetails;
}

export interface LogoutEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'LOGOUT';
    details: LogoutDetails;
}

/** Union of all strictly-typed audit entries */
export type StrictAuditLogEntry =
    | AssociatedEntry
    | RealmApprovedEntry
    | AssertionIssuedEntry
    | AssertionDeniedEntry
    | AssertionVerifiedEntry
    | LogoutEntry;

/** Omit applied to each member of a union, so every action keeps its own details */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type StrictAuditInput = DistributiveOmit<StrictAuditLogEntry, 'level' | 'timestamp'>;

// =============================================================================
// Audit Logger Interface (Contract for Implementation)
// =============================================================================

export interface AuditLogger {
    /** Log a strictly-typed audit event. */
    logStrict(entry: StrictAuditInput): void;
}
