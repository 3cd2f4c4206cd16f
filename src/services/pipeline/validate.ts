// =============================================================================
// COURSEWORK — Validation Pipeline
//
//   1. coercion + required check, per field
//   2. per-field named rules          (all fields evaluated, errors pooled)
//   3. record-level rules             (only when 1–2 produced no error)
//
// Same entry point for a single submitted form and for one row of a bulk
// file. No state survives between calls.
// =============================================================================

import { z } from 'zod';
import { ValidationFailed } from '../../errors';
import {
  ErrorSet,
  FormSpec,
  RECORD_KEY,
  RawFields,
  ValidationResult,
} from '../../types/pipeline';
import { isUploadedFile } from './fields';

function collectFieldErrors(error: z.ZodError): ErrorSet {
  const errors: Record<string, string> = {};
  for (const issue of error.issues) {
    const head = issue.path[0];
    const key = typeof head === 'string' ? head : RECORD_KEY;
    // First violation per field wins
    if (!(key in errors)) errors[key] = issue.message;
  }
  return errors;
}

/**
 * Run raw input through a form. Resolves to the clean record or a
 * non-empty ErrorSet; never throws for bad input.
 */
export async function validate<T, R>(
  form: FormSpec<T, R>,
  raw: RawFields,
): Promise<ValidationResult<R>> {
  const parsed = form.fields.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, errors: collectFieldErrors(parsed.error) };
  }

  const record = form.build(parsed.data);

  for (const rule of form.recordRules) {
    const message = await rule.check(record);
    if (message !== null) {
      return { ok: false, errors: { [RECORD_KEY]: message } };
    }
  }

  return { ok: true, value: record };
}

/**
 * The submitted values worth showing back next to their errors:
 * strings as sent, files by name, sensitive fields dropped.
 */
export function echoInput<T, R>(form: FormSpec<T, R>, raw: RawFields): Record<string, string> {
  const hidden = new Set(form.sensitive ?? []);
  const echoed: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (hidden.has(key)) continue;
    if (typeof value === 'string') echoed[key] = value;
    else if (isUploadedFile(value)) echoed[key] = value.originalName;
  }
  return echoed;
}

/** Single-record path: clean record or a thrown ValidationFailed. */
export async function validateOrThrow<T, R>(form: FormSpec<T, R>, raw: RawFields): Promise<R> {
  const result = await validate(form, raw);
  if (!result.ok) {
    throw new ValidationFailed(result.errors, echoInput(form, raw));
  }
  return result.value;
}
