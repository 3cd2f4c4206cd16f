// =============================================================================
// COURSEWORK — PostgreSQL Stores
//
// Schema: db/schema.sql. getOrCreate relies on the unique natural-key
// index: INSERT … ON CONFLICT DO NOTHING, then read back the winner.
// Driver errors are translated into the application taxonomy at this
// boundary; nothing above it sees a raw pg error. Ids are UUID columns: an
// id of any other shape matches no row and never reaches the server.
// =============================================================================

import { QueryResultRow } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { AppError, Conflict, DuplicateIdentity, StoreUnavailable } from '../errors';
import {
  Assignment,
  AssignmentNaturalKey,
  AuditEvent,
  PrincipalRecord,
  Submission,
} from '../types/records';
import { Role, isRole } from '../types/roles';
import {
  AssignmentPatch,
  AssignmentStore,
  AuditStore,
  GetOrCreateResult,
  NewPrincipal,
  NewSubmission,
  PrincipalStore,
  Stores,
  SubmissionStore,
} from '../types/store';

/** The slice of pg.Pool the stores use */
export interface SqlClient {
  query<R extends QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

// ── Error translation ─────────────────────────────────────────────────

const UNIQUE_VIOLATION = '23505';
const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isUnavailable(err: unknown): boolean {
  const code = errorCode(err);
  if (code !== undefined) {
    // Class 08: connection exception
    return UNAVAILABLE_CODES.has(code) || code.startsWith('08');
  }
  return (
    err instanceof Error &&
    /Connection terminated|timeout exceeded when trying to connect/i.test(err.message)
  );
}

/**
 * Map a driver error onto the taxonomy. `onUnique` names the error for a
 * unique violation in the calling context.
 */
export function translatePgError(err: unknown, onUnique?: () => AppError): unknown {
  if (err instanceof AppError) return err;
  if (errorCode(err) === UNIQUE_VIOLATION && onUnique) return onUnique();
  if (isUnavailable(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return new StoreUnavailable('Database unavailable', { cause: message });
  }
  return err;
}

async function run<R extends QueryResultRow>(
  db: SqlClient,
  text: string,
  values: unknown[],
  onUnique?: () => AppError,
): Promise<R[]> {
  try {
    const result = await db.query<R>(text, values);
    return result.rows;
  } catch (err) {
    throw translatePgError(err, onUnique);
  }
}

// ── Row mapping ───────────────────────────────────────────────────────

interface PrincipalRow extends QueryResultRow {
  id: string;
  credential_ref: string;
  password_hash: string;
  role: string;
  display_name: string;
  email: string;
  created_at: Date;
}

interface AssignmentRow extends QueryResultRow {
  id: string;
  title: string;
  description: string;
  due_at: Date;
  owner_id: string;
  created_at: Date;
  updated_at: Date;
}

interface SubmissionRow extends QueryResultRow {
  id: string;
  assignment_id: string;
  submitter_id: string;
  submitter_name: string;
  storage_ref: string;
  original_name: string;
  mime_type: string;
  size_bytes: number;
  submitted_at: Date;
  notified: boolean;
}

interface AuditRow extends QueryResultRow {
  id: string;
  event_type: string;
  description: string;
  actor_id: string | null;
  actor_role: string | null;
  target_type: string;
  target_id: string | null;
  metadata: Record<string, unknown>;
  event_hash: string;
  occurred_at: Date;
}

function toRole(value: string): Role {
  if (!isRole(value)) {
    throw new Error(`Unknown role in database: ${value}`);
  }
  return value;
}

function toPrincipalRecord(row: PrincipalRow): PrincipalRecord {
  return {
    id: row.id,
    credentialRef: row.credential_ref,
    passwordHash: row.password_hash,
    role: toRole(row.role),
    displayName: row.display_name,
    email: row.email,
    createdAt: row.created_at,
  };
}

function toAssignment(row: AssignmentRow): Assignment {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    dueAt: row.due_at,
    ownerId: row.owner_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toSubmission(row: SubmissionRow): Submission {
  return {
    id: row.id,
    assignmentId: row.assignment_id,
    submitterId: row.submitter_id,
    submitterName: row.submitter_name,
    file: {
      storageRef: row.storage_ref,
      originalName: row.original_name,
      mimeType: row.mime_type,
      sizeBytes: row.size_bytes,
    },
    submittedAt: row.submitted_at,
    notified: row.notified,
  };
}

function toAuditEvent(row: AuditRow): AuditEvent {
  const targetType = row.target_type;
  if (
    targetType !== 'principal' &&
    targetType !== 'assignment' &&
    targetType !== 'submission' &&
    targetType !== 'import'
  ) {
    throw new Error(`Unknown audit target type in database: ${targetType}`);
  }
  return {
    id: row.id,
    eventType: row.event_type,
    description: row.description,
    actorId: row.actor_id,
    actorRole: row.actor_role === null ? null : toRole(row.actor_role),
    targetType,
    targetId: row.target_id,
    metadata: row.metadata,
    eventHash: row.event_hash,
    occurredAt: row.occurred_at,
  };
}

// ── Principals ────────────────────────────────────────────────────────

const PRINCIPAL_COLUMNS = 'id, credential_ref, password_hash, role, display_name, email, created_at';

export class PgPrincipalStore implements PrincipalStore {
  constructor(private readonly db: SqlClient) {}

  async findById(id: string): Promise<PrincipalRecord | null> {
    if (!isUuid(id)) return null;
    const rows = await run<PrincipalRow>(
      this.db,
      `SELECT ${PRINCIPAL_COLUMNS} FROM principals WHERE id = $1`,
      [id],
    );
    return rows.length > 0 ? toPrincipalRecord(rows[0]) : null;
  }

  async findByCredentialRef(credentialRef: string): Promise<PrincipalRecord | null> {
    const rows = await run<PrincipalRow>(
      this.db,
      `SELECT ${PRINCIPAL_COLUMNS} FROM principals WHERE credential_ref = $1`,
      [credentialRef],
    );
    return rows.length > 0 ? toPrincipalRecord(rows[0]) : null;
  }

  async list(): Promise<PrincipalRecord[]> {
    const rows = await run<PrincipalRow>(
      this.db,
      `SELECT ${PRINCIPAL_COLUMNS} FROM principals ORDER BY credential_ref`,
      [],
    );
    return rows.map(toPrincipalRecord);
  }

  async insert(principal: NewPrincipal): Promise<PrincipalRecord> {
    const rows = await run<PrincipalRow>(
      this.db,
      `INSERT INTO principals (id, credential_ref, password_hash, role, display_name, email)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${PRINCIPAL_COLUMNS}`,
      [
        uuidv4(),
        principal.credentialRef,
        principal.passwordHash,
        principal.role,
        principal.displayName,
        principal.email,
      ],
      () => new DuplicateIdentity(principal.credentialRef),
    );
    return toPrincipalRecord(rows[0]);
  }

  async updateRole(id: string, role: Role): Promise<PrincipalRecord | null> {
    if (!isUuid(id)) return null;
    const rows = await run<PrincipalRow>(
      this.db,
      `UPDATE principals SET role = $2 WHERE id = $1 RETURNING ${PRINCIPAL_COLUMNS}`,
      [id, role],
    );
    return rows.length > 0 ? toPrincipalRecord(rows[0]) : null;
  }
}

// ── Assignments ───────────────────────────────────────────────────────

const ASSIGNMENT_COLUMNS = 'id, title, description, due_at, owner_id, created_at, updated_at';
const DUPLICATE_ASSIGNMENT =
  'An assignment with this title, description and due date already exists.';

export class PgAssignmentStore implements AssignmentStore {
  constructor(private readonly db: SqlClient) {}

  async getOrCreate(key: AssignmentNaturalKey): Promise<GetOrCreateResult> {
    // A concurrent delete between the two statements leaves nothing to
    // read back; one more round settles it.
    for (let attempt = 0; attempt < 2; attempt++) {
      const inserted = await run<AssignmentRow>(
        this.db,
        `INSERT INTO assignments (id, title, description, due_at, owner_id)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (owner_id, due_at, md5(title), md5(description)) DO NOTHING
         RETURNING ${ASSIGNMENT_COLUMNS}`,
        [uuidv4(), key.title, key.description, key.dueAt, key.ownerId],
      );
      if (inserted.length > 0) {
        return { assignment: toAssignment(inserted[0]), created: true };
      }

      const existing = await this.findByNaturalKey(key);
      if (existing) {
        return { assignment: existing, created: false };
      }
    }
    throw new Conflict('Assignment changed concurrently; try again');
  }

  async findById(id: string): Promise<Assignment | null> {
    if (!isUuid(id)) return null;
    const rows = await run<AssignmentRow>(
      this.db,
      `SELECT ${ASSIGNMENT_COLUMNS} FROM assignments WHERE id = $1`,
      [id],
    );
    return rows.length > 0 ? toAssignment(rows[0]) : null;
  }

  async findByNaturalKey(key: AssignmentNaturalKey): Promise<Assignment | null> {
    if (!isUuid(key.ownerId)) return null;
    const rows = await run<AssignmentRow>(
      this.db,
      `SELECT ${ASSIGNMENT_COLUMNS} FROM assignments
       WHERE owner_id = $1 AND due_at = $2 AND title = $3 AND description = $4`,
      [key.ownerId, key.dueAt, key.title, key.description],
    );
    return rows.length > 0 ? toAssignment(rows[0]) : null;
  }

  async findByOwner(ownerId: string): Promise<Assignment[]> {
    if (!isUuid(ownerId)) return [];
    const rows = await run<AssignmentRow>(
      this.db,
      `SELECT ${ASSIGNMENT_COLUMNS} FROM assignments WHERE owner_id = $1 ORDER BY created_at DESC`,
      [ownerId],
    );
    return rows.map(toAssignment);
  }

  async list(): Promise<Assignment[]> {
    const rows = await run<AssignmentRow>(
      this.db,
      `SELECT ${ASSIGNMENT_COLUMNS} FROM assignments ORDER BY created_at DESC`,
      [],
    );
    return rows.map(toAssignment);
  }

  async update(id: string, patch: AssignmentPatch): Promise<Assignment | null> {
    if (!isUuid(id)) return null;
    const rows = await run<AssignmentRow>(
      this.db,
      `UPDATE assignments
       SET title = $2, description = $3, due_at = $4, updated_at = now()
       WHERE id = $1
       RETURNING ${ASSIGNMENT_COLUMNS}`,
      [id, patch.title, patch.description, patch.dueAt],
      () => new Conflict(DUPLICATE_ASSIGNMENT),
    );
    return rows.length > 0 ? toAssignment(rows[0]) : null;
  }

  async remove(id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    const rows = await run<{ id: string }>(
      this.db,
      `DELETE FROM assignments WHERE id = $1 RETURNING id`,
      [id],
    );
    return rows.length > 0;
  }
}

// ── Submissions ───────────────────────────────────────────────────────

const SUBMISSION_COLUMNS =
  'id, assignment_id, submitter_id, submitter_name, storage_ref, original_name, mime_type, size_bytes, submitted_at, notified';

export class PgSubmissionStore implements SubmissionStore {
  constructor(private readonly db: SqlClient) {}

  async insert(submission: NewSubmission): Promise<Submission> {
    const rows = await run<SubmissionRow>(
      this.db,
      `INSERT INTO submissions
         (id, assignment_id, submitter_id, submitter_name, storage_ref, original_name, mime_type, size_bytes)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${SUBMISSION_COLUMNS}`,
      [
        uuidv4(),
        submission.assignmentId,
        submission.submitterId,
        submission.submitterName,
        submission.file.storageRef,
        submission.file.originalName,
        submission.file.mimeType,
        submission.file.sizeBytes,
      ],
    );
    return toSubmission(rows[0]);
  }

  async findById(id: string): Promise<Submission | null> {
    if (!isUuid(id)) return null;
    const rows = await run<SubmissionRow>(
      this.db,
      `SELECT ${SUBMISSION_COLUMNS} FROM submissions WHERE id = $1`,
      [id],
    );
    return rows.length > 0 ? toSubmission(rows[0]) : null;
  }

  async listForAssignment(assignmentId: string): Promise<Submission[]> {
    if (!isUuid(assignmentId)) return [];
    const rows = await run<SubmissionRow>(
      this.db,
      `SELECT ${SUBMISSION_COLUMNS} FROM submissions WHERE assignment_id = $1 ORDER BY submitted_at`,
      [assignmentId],
    );
    return rows.map(toSubmission);
  }

  async listPendingNotification(assignmentId: string): Promise<Submission[]> {
    if (!isUuid(assignmentId)) return [];
    const rows = await run<SubmissionRow>(
      this.db,
      `SELECT ${SUBMISSION_COLUMNS} FROM submissions
       WHERE assignment_id = $1 AND NOT notified
       ORDER BY submitted_at`,
      [assignmentId],
    );
    return rows.map(toSubmission);
  }

  async markNotified(id: string): Promise<void> {
    await run(this.db, `UPDATE submissions SET notified = true WHERE id = $1`, [id]);
  }
}

// ── Audit ─────────────────────────────────────────────────────────────

export class PgAuditStore implements AuditStore {
  constructor(private readonly db: SqlClient) {}

  async append(event: AuditEvent): Promise<void> {
    await run(
      this.db,
      `INSERT INTO audit_trail
         (id, event_type, description, actor_id, actor_role, target_type, target_id, metadata, event_hash, occurred_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        event.id,
        event.eventType,
        event.description,
        event.actorId,
        event.actorRole,
        event.targetType,
        event.targetId,
        JSON.stringify(event.metadata),
        event.eventHash,
        event.occurredAt,
      ],
    );
  }

  async list(limit: number): Promise<AuditEvent[]> {
    const rows = await run<AuditRow>(
      this.db,
      `SELECT id, event_type, description, actor_id, actor_role, target_type, target_id,
              metadata, event_hash, occurred_at
       FROM audit_trail ORDER BY occurred_at DESC LIMIT $1`,
      [limit],
    );
    return rows.map(toAuditEvent);
  }
}

export function createPostgresStores(db: SqlClient): Stores {
  return {
    principals: new PgPrincipalStore(db),
    assignments: new PgAssignmentStore(db),
    submissions: new PgSubmissionStore(db),
    audit: new PgAuditStore(db),
  };
}
