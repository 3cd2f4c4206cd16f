// =============================================================================
// COURSEWORK — Forms
//
// Every form is an explicit field schema, a build step and an ordered list
// of record rules. Forms whose rules consult the store are factories: the
// caller passes the state in, nothing is looked up implicitly.
// =============================================================================

import { z } from 'zod';
import { FormSpec } from '../../types/pipeline';
import { ROLES, SELF_SERVICE_ROLES } from '../../types/roles';
import { AssignmentStore } from '../../types/store';
import {
  choiceField,
  combineDateTime,
  dateField,
  dateTimeField,
  emailField,
  fileField,
  optionalTextField,
  textField,
  timeField,
} from './fields';
import {
  contentType,
  fieldsMatch,
  fileExtension,
  forbiddenWords,
  maxFileSize,
  maxLength,
  minLength,
  nonEmptyFile,
  pattern,
} from './rules';

export const FORBIDDEN_WORDS = ['spam', 'fake', 'scam'] as const;

// ── Assignments ────────────────────────────────────────────────────────

/** A validated assignment, before an owner is attached */
export interface AssignmentDraft {
  title: string;
  description: string;
  dueAt: Date;
}

const noForbiddenWords = forbiddenWords<AssignmentDraft>(
  FORBIDDEN_WORDS,
  (draft) => [draft.title, draft.description],
  'assignment',
);

const assignmentFields = z.object({
  title: textField([maxLength(200)]),
  description: textField(),
  dueAt: dateTimeField(),
});

export interface AssignmentFormContext {
  assignments: AssignmentStore;
  ownerId: string;
  /** The assignment being edited, which may keep its own key */
  excludeId?: string;
}

/**
 * Single-record assignment form. Adds a uniqueness rule on top of the
 * row form's checks so the user sees a message instead of a silent no-op.
 */
export function assignmentForm(
  context: AssignmentFormContext,
): FormSpec<z.infer<typeof assignmentFields>, AssignmentDraft> {
  return {
    name: 'assignment',
    fields: assignmentFields,
    build: ({ title, description, dueAt }) => ({ title, description, dueAt }),
    recordRules: [
      noForbiddenWords,
      {
        name: 'uniqueNaturalKey',
        check: async (draft) => {
          const existing = await context.assignments.findByNaturalKey({
            ...draft,
            ownerId: context.ownerId,
          });
          return existing && existing.id !== context.excludeId
            ? 'An assignment with this title, description and due date already exists.'
            : null;
        },
      },
    ],
  };
}

const assignmentRowFields = z.object({
  title: textField([maxLength(200)]),
  description: textField(),
  date: dateField(),
  time: timeField(),
});

/**
 * One row of a bulk file. `date` and `time` arrive as separate columns
 * and are combined here, so a bad value is reported against its column.
 */
export const assignmentRowForm: FormSpec<z.infer<typeof assignmentRowFields>, AssignmentDraft> = {
  name: 'assignment-row',
  fields: assignmentRowFields,
  build: ({ title, description, date, time }) => ({
    title,
    description,
    dueAt: combineDateTime(date, time),
  }),
  recordRules: [noForbiddenWords],
};

const bulkUploadFields = (maxBytes: number) =>
  z.object({
    csv_file: fileField([
      fileExtension('.csv', 'Please upload a valid CSV file.'),
      contentType(['text/csv'], 'File type is not CSV.'),
      maxFileSize(maxBytes),
    ]),
  });

export type BulkUpload = z.infer<ReturnType<typeof bulkUploadFields>>;

export function bulkUploadForm(maxBytes: number): FormSpec<BulkUpload, BulkUpload> {
  return {
    name: 'bulk-upload',
    fields: bulkUploadFields(maxBytes),
    build: (cleaned) => cleaned,
    recordRules: [],
  };
}

// ── Submissions ────────────────────────────────────────────────────────

const submissionFields = (maxBytes: number) =>
  z.object({
    submitterName: textField([maxLength(100), minLength(2)]),
    file: fileField([nonEmptyFile(), maxFileSize(maxBytes)]),
  });

export type SubmissionDraft = z.infer<ReturnType<typeof submissionFields>>;

export function submissionForm(maxBytes: number): FormSpec<SubmissionDraft, SubmissionDraft> {
  return {
    name: 'submission',
    fields: submissionFields(maxBytes),
    build: (cleaned) => cleaned,
    recordRules: [],
  };
}

// ── Accounts ───────────────────────────────────────────────────────────

export const DISPLAY_NAME_MAX_LENGTH = 100;

const registrationFields = z.object({
  username: textField([
    maxLength(150),
    pattern(
      /^[\w.@+-]+$/,
      'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.',
    ),
  ]),
  email: emailField(),
  displayName: optionalTextField([maxLength(DISPLAY_NAME_MAX_LENGTH)]),
  password1: textField([], { trim: false }),
  password2: textField([], { trim: false }),
  role: choiceField(SELF_SERVICE_ROLES),
});

export type RegistrationDraft = z.infer<typeof registrationFields>;

export const registrationForm: FormSpec<RegistrationDraft, RegistrationDraft> = {
  name: 'registration',
  fields: registrationFields,
  sensitive: ['password1', 'password2'],
  build: (cleaned) => cleaned,
  recordRules: [
    fieldsMatch<RegistrationDraft>(
      (draft) => draft.password1,
      (draft) => draft.password2,
      "The two password fields didn't match.",
    ),
  ],
};

const roleChangeFields = z.object({
  role: choiceField(ROLES),
});

export type RoleChange = z.infer<typeof roleChangeFields>;

export const roleChangeForm: FormSpec<RoleChange, RoleChange> = {
  name: 'role-change',
  fields: roleChangeFields,
  build: (cleaned) => cleaned,
  recordRules: [],
};

// ── Contact ────────────────────────────────────────────────────────────

const contactFields = z.object({
  name: textField([maxLength(100), minLength(2, 'Name must be at least 2 characters long.')]),
  email: emailField(),
  message: textField([minLength(10, 'Message must be at least 10 characters long.')]),
});

export type ContactMessage = z.infer<typeof contactFields>;

export const contactForm: FormSpec<ContactMessage, ContactMessage> = {
  name: 'contact',
  fields: contactFields,
  build: (cleaned) => cleaned,
  recordRules: [],
};
