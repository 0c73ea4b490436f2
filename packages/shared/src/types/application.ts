/**
 * @stakewatch/shared — Application Types
 *
 * Shapes for on-chain application records and the outcome of a single
 * lookup. A lookup never throws: every failure is one of the tagged
 * variants of `QueryResult`.
 */

// ─── Records ──────────────────────────────────────────────────────

export interface ServiceConfig {
    readonly serviceId: string;
}

export interface ApplicationRecord {
    readonly address: string;
    /** Stake in upokt */
    readonly stakeAmount: bigint;
    readonly serviceConfigs: readonly ServiceConfig[];
}

// ─── Query Outcome ────────────────────────────────────────────────

export type QueryFailureKind = 'invocation_failed' | 'parse_failed' | 'field_missing';

export interface QuerySuccess {
    readonly kind: 'ok';
    readonly record: ApplicationRecord;
}

export interface QueryFailure {
    readonly kind: QueryFailureKind;
    readonly message: string;
}

export type QueryResult = QuerySuccess | QueryFailure;

// ─── Display ──────────────────────────────────────────────────────

export type RowStatus = 'ok' | 'error' | 'parse_error';

export interface DisplayRow {
    readonly address: string;
    readonly stake: string;
    readonly serviceId: string;
    readonly gateway: string;
    readonly status: RowStatus;
    /** Raw stake kept for ordering; null on error rows */
    readonly stakeAmount: bigint | null;
}
