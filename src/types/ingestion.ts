// =============================================================================
// COURSEWORK — Bulk Import Types
// =============================================================================

import { ErrorSet } from './pipeline';

/** Columns every bulk source must carry */
export const REQUIRED_COLUMNS = ['title', 'description', 'date', 'time'] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/** Outcome of one data row. Every processed row gets exactly one. */
export type RowOutcome =
  | { rowIndex: number; status: 'created'; assignmentId: string }
  | { rowIndex: number; status: 'skipped'; assignmentId: string }
  | { rowIndex: number; status: 'failed'; errors: ErrorSet };

export interface RowError {
  rowIndex: number;
  errors: ErrorSet;
}

/**
 * Aggregated result of one import. A failed row is reported, never
 * fatal: `failedCount` rows sit beside the created and skipped ones.
 */
export interface ImportReport {
  createdCount: number;
  skippedCount: number;
  failedCount: number;
  /** Rows that reached an outcome (fewer than the source when aborted) */
  rowCount: number;
  /** Failed rows, in source order */
  perRowErrors: RowError[];
  /** Every processed row, in source order */
  outcomes: RowOutcome[];
  /** True when the caller cancelled before every row was processed */
  aborted: boolean;
}

export interface ImportOptions {
  /** Owner of the created assignments; defaults to the actor */
  ownerId?: string;
  delimiter?: string;
  /** Rows processed at once. Results do not depend on it. */
  concurrency?: number;
  maxRows?: number;
  signal?: AbortSignal;
}
