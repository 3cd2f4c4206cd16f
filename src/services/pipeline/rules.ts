// =============================================================================
// COURSEWORK — Named Validators
//
// Stage 2 (per-field) and stage 3 (record-level) predicates. Each is a
// pure function from a cleaned value to a message or null, wrapped with a
// name so a form's rule list reads as an explicit ordered catalogue.
// =============================================================================

import { FieldRule, RecordRule } from '../../types/pipeline';
import { UploadedFile } from '../../types/records';

// ── Text ───────────────────────────────────────────────────────────────

export function minLength(min: number, message?: string): FieldRule<string> {
  return {
    name: `minLength(${min})`,
    check: (value) =>
      value.length < min
        ? message ?? `Ensure this value has at least ${min} characters (it has ${value.length}).`
        : null,
  };
}

export function maxLength(max: number, message?: string): FieldRule<string> {
  return {
    name: `maxLength(${max})`,
    check: (value) =>
      value.length > max
        ? message ?? `Ensure this value has at most ${max} characters (it has ${value.length}).`
        : null,
  };
}

export function noNullCharacters(message = 'Null characters are not allowed.'): FieldRule<string> {
  return {
    name: 'noNullCharacters',
    check: (value) => (value.includes('\0') ? message : null),
  };
}

export function pattern(regex: RegExp, message: string): FieldRule<string> {
  return {
    name: `pattern(${regex.source})`,
    check: (value) => (regex.test(value) ? null : message),
  };
}

// ── Files ──────────────────────────────────────────────────────────────

export function fileExtension(extension: string, message: string): FieldRule<UploadedFile> {
  const wanted = extension.toLowerCase();
  return {
    name: `fileExtension(${wanted})`,
    check: (file) => (file.originalName.toLowerCase().endsWith(wanted) ? null : message),
  };
}

export function contentType(allowed: readonly string[], message: string): FieldRule<UploadedFile> {
  return {
    name: `contentType(${allowed.join('|')})`,
    check: (file) => (allowed.includes(file.mimeType) ? null : message),
  };
}

export function nonEmptyFile(message = 'The submitted file is empty.'): FieldRule<UploadedFile> {
  return {
    name: 'nonEmptyFile',
    check: (file) => (file.sizeBytes > 0 ? null : message),
  };
}

export function maxFileSize(maxBytes: number): FieldRule<UploadedFile> {
  return {
    name: `maxFileSize(${maxBytes})`,
    check: (file) =>
      file.sizeBytes > maxBytes
        ? `Ensure this file is at most ${maxBytes} bytes (it is ${file.sizeBytes}).`
        : null,
  };
}

// ── Record-level ───────────────────────────────────────────────────────

/**
 * Case-insensitive substring scan over several fields at once. Words are
 * checked in list order; the first hit is reported.
 */
export function forbiddenWords<R>(
  words: readonly string[],
  pick: (record: R) => string[],
  noun: string,
): RecordRule<R> {
  return {
    name: 'forbiddenWords',
    check: (record) => {
      const haystacks = pick(record).map((text) => text.toLowerCase());
      const hit = words.find((word) => haystacks.some((text) => text.includes(word)));
      return hit === undefined ? null : `The ${noun} contains a forbidden word: ${hit}`;
    },
  };
}

export function fieldsMatch<R>(
  first: (record: R) => string,
  second: (record: R) => string,
  message: string,
): RecordRule<R> {
  return {
    name: 'fieldsMatch',
    check: (record) => (first(record) === second(record) ? null : message),
  };
}
