// =============================================================================
// COURSEWORK — Test Suite 04: Validation Pipeline
// =============================================================================

import { z } from 'zod';
import { ValidationFailed } from '../src/errors';
import {
  assignmentForm,
  assignmentRowForm,
  bulkUploadForm,
  contactForm,
  echoInput,
  parseCalendarDate,
  parseClockTime,
  parseDateTime,
  registrationForm,
  submissionForm,
  validate,
  validateOrThrow,
} from '../src/services/pipeline';
import { textField } from '../src/services/pipeline/fields';
import { maxLength, minLength } from '../src/services/pipeline/rules';
import { createMemoryStores } from '../src/store/memory';
import { FormSpec } from '../src/types/pipeline';
import { UploadedFile } from '../src/types/records';

function upload(name: string, content: string, mimeType = 'text/csv'): UploadedFile {
  const buffer = Buffer.from(content);
  return { originalName: name, mimeType, sizeBytes: buffer.length, buffer };
}

describe('Validation Pipeline', () => {
  // ── Contact form ──────────────────────────────────────────────────────

  describe('contact form', () => {
    test('short name is an error on name', async () => {
      const result = await validate(contactForm, {
        name: 'A',
        email: 'a@example.com',
        message: 'Hello there, world',
      });
      expect(result).toEqual({
        ok: false,
        errors: { name: 'Name must be at least 2 characters long.' },
      });
    });

    test('short message is an error on message', async () => {
      const result = await validate(contactForm, {
        name: 'Al',
        email: 'al@example.com',
        message: 'Too short',
      });
      expect(result).toEqual({
        ok: false,
        errors: { message: 'Message must be at least 10 characters long.' },
      });
    });

    test('both thresholds met is a success', async () => {
      const result = await validate(contactForm, {
        name: 'Al',
        email: 'al@example.com',
        message: 'Ten chars!',
      });
      expect(result).toEqual({
        ok: true,
        value: { name: 'Al', email: 'al@example.com', message: 'Ten chars!' },
      });
    });

    test('every field is evaluated and errors are pooled', async () => {
      const result = await validate(contactForm, { name: ' ', email: 'not-an-email', message: 'hi' });
      expect(result).toEqual({
        ok: false,
        errors: {
          name: 'This field is required.',
          email: 'Enter a valid email address.',
          message: 'Message must be at least 10 characters long.',
        },
      });
    });

    test('text is trimmed before rules run', async () => {
      const result = await validate(contactForm, {
        name: '  Bo  ',
        email: ' bo@example.com ',
        message: '   abcdefghij   ',
      });
      expect(result).toEqual({
        ok: true,
        value: { name: 'Bo', email: 'bo@example.com', message: 'abcdefghij' },
      });
    });

    test('a non-string value is a type error', async () => {
      const result = await validate(contactForm, {
        name: 42,
        email: 'al@example.com',
        message: 'Hello there, world',
      });
      expect(result).toEqual({ ok: false, errors: { name: 'Enter a text value.' } });
    });

    test('an address longer than the column is a field error', async () => {
      const result = await validate(contactForm, {
        name: 'Pat',
        email: `${'a'.repeat(250)}@example.com`,
        message: 'Hello there, world',
      });
      expect(result).toEqual({
        ok: false,
        errors: { email: 'Ensure this value has at most 254 characters (it has 262).' },
      });
    });
  });

  // ── Null characters ───────────────────────────────────────────────────

  describe('null characters', () => {
    test('a NUL in a text column fails that column', async () => {
      const result = await validate(assignmentRowForm, {
        title: 'Es\0say',
        description: 'Write it',
        date: '2024-05-01',
        time: '09:00',
      });
      expect(result).toEqual({ ok: false, errors: { title: 'Null characters are not allowed.' } });
    });

    test('NUL is checked before the field\'s own rules', async () => {
      const result = await validate(contactForm, {
        name: 'P\0',
        email: 'pat@example.com',
        message: 'Hello there, world',
      });
      expect(result).toEqual({ ok: false, errors: { name: 'Null characters are not allowed.' } });
    });
  });

  // ── Per-field rules ───────────────────────────────────────────────────

  describe('field rules', () => {
    const shortCode: FormSpec<{ code: string }, { code: string }> = {
      name: 'short-code',
      fields: z.object({ code: textField([minLength(3), maxLength(5)]) }),
      build: (cleaned) => cleaned,
      recordRules: [],
    };

    test('the first failing rule is the field message', async () => {
      expect(await validate(shortCode, { code: 'ab' })).toEqual({
        ok: false,
        errors: { code: 'Ensure this value has at least 3 characters (it has 2).' },
      });
      expect(await validate(shortCode, { code: 'abcdefg' })).toEqual({
        ok: false,
        errors: { code: 'Ensure this value has at most 5 characters (it has 7).' },
      });
    });

    test('validation keeps no state between calls', async () => {
      await validate(shortCode, { code: 'ab' });
      expect(await validate(shortCode, { code: 'abcd' })).toEqual({ ok: true, value: { code: 'abcd' } });
    });
  });

  // ── Record rules ──────────────────────────────────────────────────────

  describe('record rules', () => {
    test('forbidden word in the description is a record-level error', async () => {
      const result = await validate(assignmentRowForm, {
        title: 'Weekly quiz',
        description: 'Not a SCAM, promise',
        date: '2024-05-01',
        time: '09:00',
      });
      expect(result).toEqual({
        ok: false,
        errors: { _record: 'The assignment contains a forbidden word: scam' },
      });
    });

    test('record rules do not run while a field is invalid', async () => {
      const result = await validate(assignmentRowForm, {
        title: 'spam',
        description: 'spam',
        date: 'tomorrow',
        time: '09:00',
      });
      expect(result).toEqual({ ok: false, errors: { date: 'invalid format' } });
    });

    test('natural key uniqueness consults the store it is given', async () => {
      const stores = createMemoryStores();
      const dueAt = new Date('2024-06-01T17:00:00Z');
      const existing = await stores.assignments.getOrCreate({
        title: 'Lab report',
        description: 'Titration',
        dueAt,
        ownerId: 'owner-1',
      });
      const raw = { title: 'Lab report', description: 'Titration', dueAt: '2024-06-01T17:00' };

      expect(
        await validate(assignmentForm({ assignments: stores.assignments, ownerId: 'owner-1' }), raw),
      ).toEqual({
        ok: false,
        errors: { _record: 'An assignment with this title, description and due date already exists.' },
      });

      // Same key for a different owner is a different assignment
      const otherOwner = await validate(
        assignmentForm({ assignments: stores.assignments, ownerId: 'owner-2' }),
        raw,
      );
      expect(otherOwner.ok).toBe(true);

      // Editing the record that holds the key keeps it
      const editing = await validate(
        assignmentForm({
          assignments: stores.assignments,
          ownerId: 'owner-1',
          excludeId: existing.assignment.id,
        }),
        raw,
      );
      expect(editing).toEqual({
        ok: true,
        value: { title: 'Lab report', description: 'Titration', dueAt },
      });
    });
  });

  // ── Date and time ─────────────────────────────────────────────────────

  describe('date and time parsing', () => {
    test('calendar dates are checked strictly', () => {
      expect(parseCalendarDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
      expect(parseCalendarDate('2023-02-29')).toBeNull();
      expect(parseCalendarDate('1900-02-29')).toBeNull();
      expect(parseCalendarDate('2000-02-29')).toEqual({ year: 2000, month: 2, day: 29 });
      expect(parseCalendarDate('2024-04-31')).toBeNull();
      expect(parseCalendarDate('2024-4-01')).toBeNull();
      expect(parseCalendarDate('01/04/2024')).toBeNull();
    });

    test('clock times are 24-hour HH:MM', () => {
      expect(parseClockTime('00:00')).toEqual({ hour: 0, minute: 0 });
      expect(parseClockTime('23:59')).toEqual({ hour: 23, minute: 59 });
      expect(parseClockTime('24:00')).toBeNull();
      expect(parseClockTime('9:30')).toBeNull();
      expect(parseClockTime('09:30:00')).toBeNull();
    });

    test('date and time combine into a UTC instant', async () => {
      const result = await validate(assignmentRowForm, {
        title: 'Reading',
        description: 'Chapter 4',
        date: '2024-05-03',
        time: '14:05',
      });
      expect(result).toEqual({
        ok: true,
        value: {
          title: 'Reading',
          description: 'Chapter 4',
          dueAt: new Date('2024-05-03T14:05:00.000Z'),
        },
      });
    });

    test('a combined value accepts a space or a T separator', () => {
      expect(parseDateTime('2024-05-03 14:05')).toEqual(new Date('2024-05-03T14:05:00.000Z'));
      expect(parseDateTime('2024-05-03T14:05')).toEqual(new Date('2024-05-03T14:05:00.000Z'));
      expect(parseDateTime('2024-05-03')).toBeNull();
    });

    test('bad date and bad time are reported on their own columns', async () => {
      const result = await validate(assignmentRowForm, {
        title: 'Reading',
        description: 'Chapter 4',
        date: '03/05/2024',
        time: 'noon',
      });
      expect(result).toEqual({
        ok: false,
        errors: { date: 'invalid format', time: 'invalid format' },
      });
    });
  });

  // ── Files ─────────────────────────────────────────────────────────────

  describe('file fields', () => {
    test('bulk upload requires a .csv file of type text/csv', async () => {
      const form = bulkUploadForm(1024);
      expect(await validate(form, {})).toEqual({
        ok: false,
        errors: { csv_file: 'No file was submitted.' },
      });
      expect(await validate(form, { csv_file: upload('tasks.xlsx', 'x') })).toEqual({
        ok: false,
        errors: { csv_file: 'Please upload a valid CSV file.' },
      });
      expect(await validate(form, { csv_file: upload('tasks.csv', 'x', 'application/pdf') })).toEqual({
        ok: false,
        errors: { csv_file: 'File type is not CSV.' },
      });
      const ok = await validate(form, { csv_file: upload('TASKS.CSV', 'x') });
      expect(ok.ok).toBe(true);
    });

    test('submission files must be non-empty and within the size limit', async () => {
      const form = submissionForm(8);
      expect(await validate(form, { submitterName: 'Bo', file: upload('a.txt', '', 'text/plain') })).toEqual({
        ok: false,
        errors: { file: 'The submitted file is empty.' },
      });
      const big = await validate(form, { submitterName: 'Bo', file: upload('a.txt', '123456789', 'text/plain') });
      expect(big.ok).toBe(false);
      if (!big.ok) expect(Object.keys(big.errors)).toEqual(['file']);
    });
  });

  // ── Single-record path ────────────────────────────────────────────────

  describe('single-record path', () => {
    test('validateOrThrow raises ValidationFailed with the echoed input', async () => {
      const raw = {
        username: 'erin',
        email: 'erin@example.com',
        password1: 'first-secret-1',
        password2: 'other-secret-2',
        role: 'student',
      };
      await expect(validateOrThrow(registrationForm, raw)).rejects.toBeInstanceOf(ValidationFailed);

      try {
        await validateOrThrow(registrationForm, raw);
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationFailed);
        if (err instanceof ValidationFailed) {
          expect(err.errors).toEqual({ _record: "The two password fields didn't match." });
          expect(err.input).toEqual({ username: 'erin', email: 'erin@example.com', role: 'student' });
        }
      }
    });

    test('echoInput shows files by name', () => {
      const echoed = echoInput(bulkUploadForm(1024), { csv_file: upload('tasks.csv', 'x'), note: 'hi', n: 3 });
      expect(echoed).toEqual({ csv_file: 'tasks.csv', note: 'hi' });
    });
  });
});
