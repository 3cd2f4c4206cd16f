// =============================================================================
// COURSEWORK — Field Coercers
//
// Stage 1 of the pipeline: coerce one raw value to its semantic type and
// enforce presence. Stage 2 (the field's named rules) is attached with
// withRules and runs only when coercion succeeded.
//
// Text is trimmed and an empty string counts as missing, the same as an
// absent key. Every text field rejects NUL before its own rules run.
// =============================================================================

import { z } from 'zod';
import { FieldRule } from '../../types/pipeline';
import { UploadedFile } from '../../types/records';
import { maxLength, noNullCharacters } from './rules';

export const REQUIRED_MESSAGE = 'This field is required.';
export const INVALID_FORMAT_MESSAGE = 'invalid format';
export const INVALID_EMAIL_MESSAGE = 'Enter a valid email address.';
export const NO_FILE_MESSAGE = 'No file was submitted.';

/** Longest address the principals table holds */
export const EMAIL_MAX_LENGTH = 254;

/** A field schema: accepts anything, yields T or issues */
export type Field<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ClockTime {
  hour: number;
  minute: number;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;
const DATE_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Strict `YYYY-MM-DD` with calendar check. */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) return null;

  const limit = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day > limit ? null : { year, month, day };
}

/** Strict 24-hour `HH:MM`. */
export function parseClockTime(value: string): ClockTime | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/**
 * Combine a date and a time into one instant. Wall-clock values are
 * interpreted as UTC.
 */
export function combineDateTime(date: CalendarDate, time: ClockTime): Date {
  const result = new Date(0);
  result.setUTCFullYear(date.year, date.month - 1, date.day);
  result.setUTCHours(time.hour, time.minute, 0, 0);
  return result;
}

export function parseDateTime(value: string): Date | null {
  const match = DATE_TIME_PATTERN.exec(value);
  if (!match) return null;

  const date = parseCalendarDate(match[1]);
  const time = parseClockTime(match[2]);
  return date && time ? combineDateTime(date, time) : null;
}

export function isUploadedFile(value: unknown): value is UploadedFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'originalName' in value && typeof value.originalName === 'string' &&
    'mimeType' in value && typeof value.mimeType === 'string' &&
    'sizeBytes' in value && typeof value.sizeBytes === 'number' &&
    'buffer' in value && Buffer.isBuffer(value.buffer)
  );
}

// ── Helpers ────────────────────────────────────────────────────────────

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function emptyToUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

function requiredString(): z.ZodString {
  return z.string({
    required_error: REQUIRED_MESSAGE,
    invalid_type_error: 'Enter a text value.',
  });
}

/**
 * Attach a field's ordered rule list. Rules run in declaration order and
 * the first violation is the field's error.
 */
export function withRules<T>(field: Field<T>, rules: readonly FieldRule<T>[]): Field<T> {
  if (rules.length === 0) return field;
  return field.superRefine((value, ctx) => {
    for (const rule of rules) {
      const message = rule.check(value);
      if (message !== null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message, params: { rule: rule.name } });
        return;
      }
    }
  });
}

// ── Field kinds ────────────────────────────────────────────────────────

export function textField(
  rules: readonly FieldRule<string>[] = [],
  options: { trim?: boolean } = {},
): Field<string> {
  const normalize = options.trim === false ? emptyToUndefined : blankToUndefined;
  return withRules(z.preprocess(normalize, requiredString()), [noNullCharacters(), ...rules]);
}

/** Optional text: a missing value cleans to the empty string. */
export function optionalTextField(rules: readonly FieldRule<string>[] = []): Field<string> {
  const base = z
    .preprocess(blankToUndefined, requiredString().optional())
    .transform((value) => value ?? '');
  return withRules(base, [noNullCharacters(), ...rules]);
}

export function emailField(rules: readonly FieldRule<string>[] = []): Field<string> {
  const base = z.preprocess(blankToUndefined, requiredString().email(INVALID_EMAIL_MESSAGE));
  return withRules(base, [maxLength(EMAIL_MAX_LENGTH), ...rules]);
}

export function choiceField<T extends string>(choices: readonly [T, ...T[]]): Field<T> {
  return z.preprocess(blankToUndefined, requiredString()).transform((value, ctx) => {
    const choice = choices.find((candidate) => candidate === value);
    if (choice === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Select a valid choice. ${value} is not one of the available choices.`,
      });
      return z.NEVER;
    }
    return choice;
  });
}

export function dateField(): Field<CalendarDate> {
  return z.preprocess(blankToUndefined, requiredString()).transform((value, ctx) => {
    const parsed = parseCalendarDate(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_FORMAT_MESSAGE });
      return z.NEVER;
    }
    return parsed;
  });
}

export function timeField(): Field<ClockTime> {
  return z.preprocess(blankToUndefined, requiredString()).transform((value, ctx) => {
    const parsed = parseClockTime(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_FORMAT_MESSAGE });
      return z.NEVER;
    }
    return parsed;
  });
}

/** `YYYY-MM-DD HH:MM` or the `YYYY-MM-DDTHH:MM` a datetime-local input sends */
export function dateTimeField(): Field<Date> {
  return z.preprocess(blankToUndefined, requiredString()).transform((value, ctx) => {
    const parsed = parseDateTime(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_FORMAT_MESSAGE });
      return z.NEVER;
    }
    return parsed;
  });
}

export function fileField(rules: readonly FieldRule<UploadedFile>[] = []): Field<UploadedFile> {
  const base = z.custom<UploadedFile>(isUploadedFile, { message: NO_FILE_MESSAGE, fatal: true });
  return withRules(base, rules);
}
