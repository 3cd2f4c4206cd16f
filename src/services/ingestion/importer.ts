// =============================================================================
// COURSEWORK — Bulk Assignment Import
//
// source ─► decode ─► parse ─► header check ─► per row:
//   validate (assignment-row form) ─► guard ─► getOrCreate ─► outcome
//
// Structural problems (bad encoding, bad quoting, missing columns) abort
// before any row is touched. Row problems, store rejections included, are
// recorded and the batch goes on; only StoreUnavailable ends it early.
// Rows already committed stay committed whatever happens later: the batch
// is not one transaction.
// =============================================================================

import { AppError, MissingColumn, PermissionDenied, StoreUnavailable } from '../../errors';
import { Owned, requireOperation, requireOwnership } from '../../authorization/guard';
import { ImportOptions, ImportReport, REQUIRED_COLUMNS, RowOutcome } from '../../types/ingestion';
import { RECORD_KEY } from '../../types/pipeline';
import { Principal } from '../../types/records';
import { AssignmentStore, GetOrCreateResult } from '../../types/store';
import { AuditTrail } from '../audit';
import { assignmentRowForm } from '../pipeline/forms';
import { validate } from '../pipeline/validate';
import { DelimitedRow, decodeSource, parseDelimited } from './delimited';

export interface ImporterDeps {
  assignments: AssignmentStore;
  audit: AuditTrail;
}

export interface ImporterDefaults {
  concurrency: number;
  maxRows: number;
}

export const ROW_NOT_SAVED_MESSAGE = 'The row could not be saved.';

/** Only StoreUnavailable stops a batch; any other store error fails its row. */
function rowFailureMessage(rowIndex: number, err: unknown): string {
  if (err instanceof AppError) return err.message;
  const detail = err instanceof Error ? err.message : String(err);
  console.error(`[Import] Row ${rowIndex} rejected by the store: ${detail}`);
  return ROW_NOT_SAVED_MESSAGE;
}

// ── Report ────────────────────────────────────────────────────────────

export function summarize(outcomes: RowOutcome[], aborted: boolean): ImportReport {
  const report: ImportReport = {
    createdCount: 0,
    skippedCount: 0,
    failedCount: 0,
    rowCount: outcomes.length,
    perRowErrors: [],
    outcomes,
    aborted,
  };
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'created':
        report.createdCount++;
        break;
      case 'skipped':
        report.skippedCount++;
        break;
      case 'failed':
        report.failedCount++;
        report.perRowErrors.push({ rowIndex: outcome.rowIndex, errors: outcome.errors });
        break;
    }
  }
  return report;
}

// ── Importer ──────────────────────────────────────────────────────────

export class AssignmentImporter {
  private readonly defaults: ImporterDefaults;

  constructor(
    private readonly deps: ImporterDeps,
    defaults: Partial<ImporterDefaults> = {},
  ) {
    this.defaults = {
      concurrency: defaults.concurrency ?? 1,
      maxRows: defaults.maxRows ?? 10_000,
    };
  }

  /**
   * Import every row of a delimited source on behalf of `actor`.
   *
   * Throws MalformedSource or MissingColumn before any write. Throws
   * StoreUnavailable (with `details.partialReport`) when the store drops
   * out mid-batch. Everything else ends up in the report.
   */
  async importSource(
    source: Buffer | string,
    actor: Principal,
    options: ImportOptions = {},
  ): Promise<ImportReport> {
    const table = parseDelimited(decodeSource(source), {
      delimiter: options.delimiter,
      maxRows: options.maxRows ?? this.defaults.maxRows,
    });

    const positions = new Map<string, number>();
    table.header.forEach((name, i) => positions.set(name, i));
    const missing = REQUIRED_COLUMNS.filter((column) => !positions.has(column));
    if (missing.length > 0) {
      throw new MissingColumn(missing);
    }

    const owner: Owned = { ownerId: options.ownerId ?? actor.id };
    const rows = table.rows;
    const results: Array<RowOutcome | undefined> = new Array(rows.length);
    const concurrency = Math.max(1, Math.min(options.concurrency ?? this.defaults.concurrency, rows.length));
    const signal = options.signal;

    const state: { next: number; failure: { error: unknown } | null } = { next: 0, failure: null };

    const worker = async (): Promise<void> => {
      while (state.next < rows.length && state.failure === null && !signal?.aborted) {
        const i = state.next++;
        try {
          results[i] = await this.processRow(rows[i], positions, actor, owner);
        } catch (err) {
          if (state.failure === null) state.failure = { error: err };
          return;
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    const outcomes = results.filter((outcome): outcome is RowOutcome => outcome !== undefined);
    const aborted = outcomes.length < rows.length && Boolean(signal?.aborted);
    const report = summarize(outcomes, aborted);

    if (state.failure !== null) {
      const { error } = state.failure;
      if (error instanceof StoreUnavailable) {
        console.error(`[Import] Store unavailable after ${report.rowCount} of ${rows.length} rows`);
        throw new StoreUnavailable(error.message, { partialReport: report });
      }
      throw error;
    }

    if (report.createdCount + report.skippedCount > 0) {
      await this.deps.audit.record({
        eventType: 'assignment.import',
        description: `Imported ${report.createdCount} assignment(s), skipped ${report.skippedCount}, rejected ${report.failedCount}`,
        actor,
        targetType: 'import',
        metadata: {
          ownerId: owner.ownerId,
          createdCount: report.createdCount,
          skippedCount: report.skippedCount,
          failedCount: report.failedCount,
          aborted: report.aborted,
        },
      });
    }

    console.log(
      `[Import] ${actor.credentialRef}: ${report.createdCount} created, ` +
        `${report.skippedCount} skipped, ${report.failedCount} failed` +
        (report.aborted ? ' (aborted)' : ''),
    );

    return report;
  }

  private async processRow(
    row: DelimitedRow,
    positions: ReadonlyMap<string, number>,
    actor: Principal,
    owner: Owned,
  ): Promise<RowOutcome> {
    const rowIndex = row.index;
    const candidate: Record<string, unknown> = {};
    for (const column of REQUIRED_COLUMNS) {
      const at = positions.get(column);
      candidate[column] = at !== undefined && at < row.cells.length ? row.cells[at] : undefined;
    }

    const result = await validate(assignmentRowForm, candidate);
    if (!result.ok) {
      return { rowIndex, status: 'failed', errors: result.errors };
    }

    try {
      requireOperation(actor, 'assignment.import');
      requireOwnership(actor, owner);
    } catch (err) {
      if (err instanceof PermissionDenied) {
        return { rowIndex, status: 'failed', errors: { [RECORD_KEY]: err.message } };
      }
      throw err;
    }

    let stored: GetOrCreateResult;
    try {
      stored = await this.deps.assignments.getOrCreate({ ...result.value, ownerId: owner.ownerId });
    } catch (err) {
      if (err instanceof StoreUnavailable) throw err;
      return { rowIndex, status: 'failed', errors: { [RECORD_KEY]: rowFailureMessage(rowIndex, err) } };
    }

    const { assignment, created } = stored;
    return created
      ? { rowIndex, status: 'created', assignmentId: assignment.id }
      : { rowIndex, status: 'skipped', assignmentId: assignment.id };
  }
}
