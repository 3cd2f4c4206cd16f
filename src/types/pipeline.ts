// =============================================================================
// COURSEWORK — Validation Pipeline Types
//
// Untrusted input arrives as a flat mapping of field name → raw value
// (string from a form or a CSV cell, UploadedFile from multipart). The
// pipeline turns it into a typed record or an ErrorSet.
// =============================================================================

import { z } from 'zod';

/** Key under which record-level (non-field) errors are reported */
export const RECORD_KEY = '_record';

/** Untrusted input. Values are narrowed by each field's coercer. */
export type RawFields = Readonly<Record<string, unknown>>;

/** Field name (or `_record`) → human-readable violation */
export type ErrorSet = Readonly<Record<string, string>>;

export type ValidationResult<R> =
  | { ok: true; value: R }
  | { ok: false; errors: ErrorSet };

/**
 * A named per-field predicate. Returns the violation message, or null
 * when the value passes.
 */
export interface FieldRule<T> {
  readonly name: string;
  check(value: T): string | null;
}

/**
 * A named record-level predicate. Runs only once every field is clean.
 * May consult external state, so it may be async.
 */
export interface RecordRule<R> {
  readonly name: string;
  check(record: R): string | null | Promise<string | null>;
}

/**
 * A form: the field schema (coercion + per-field rules), the step that
 * shapes cleaned fields into the record, and the record-level rules.
 * Forms that depend on external state are built per call.
 */
export interface FormSpec<T, R> {
  readonly name: string;
  readonly fields: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Fields never echoed back to the client */
  readonly sensitive?: readonly string[];
  build(cleaned: T): R;
  readonly recordRules: readonly RecordRule<R>[];
}
