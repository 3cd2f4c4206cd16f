// =============================================================================
// COURSEWORK — In-Memory Stores
//
// Process-local implementations of the store interfaces, used by the test
// suite and by STORE_DRIVER=memory. Each getOrCreate checks and inserts
// without an intervening await, which makes it atomic on the event loop.
// Records are copied on the way in and out.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { Conflict, DuplicateIdentity } from '../errors';
import {
  Assignment,
  AssignmentNaturalKey,
  AuditEvent,
  PrincipalRecord,
  Submission,
} from '../types/records';
import { Role } from '../types/roles';
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

export function naturalKeyOf(key: AssignmentNaturalKey): string {
  return JSON.stringify([key.ownerId, key.dueAt.toISOString(), key.title, key.description]);
}

function copyAssignment(assignment: Assignment): Assignment {
  return {
    ...assignment,
    dueAt: new Date(assignment.dueAt),
    createdAt: new Date(assignment.createdAt),
    updatedAt: new Date(assignment.updatedAt),
  };
}

function copySubmission(submission: Submission): Submission {
  return {
    ...submission,
    file: { ...submission.file },
    submittedAt: new Date(submission.submittedAt),
  };
}

/** Clock shared by the stores; overridable so tests can order records. */
export type Clock = () => Date;

// ── Principals ────────────────────────────────────────────────────────

export class MemoryPrincipalStore implements PrincipalStore {
  private readonly byId = new Map<string, PrincipalRecord>();

  constructor(private readonly now: Clock = () => new Date()) {}

  async findById(id: string): Promise<PrincipalRecord | null> {
    const record = this.byId.get(id);
    return record ? { ...record } : null;
  }

  async findByCredentialRef(credentialRef: string): Promise<PrincipalRecord | null> {
    for (const record of this.byId.values()) {
      if (record.credentialRef === credentialRef) return { ...record };
    }
    return null;
  }

  async list(): Promise<PrincipalRecord[]> {
    return [...this.byId.values()]
      .sort((a, b) => a.credentialRef.localeCompare(b.credentialRef))
      .map((record) => ({ ...record }));
  }

  async insert(principal: NewPrincipal): Promise<PrincipalRecord> {
    for (const record of this.byId.values()) {
      if (record.credentialRef === principal.credentialRef) {
        throw new DuplicateIdentity(principal.credentialRef);
      }
    }
    const record: PrincipalRecord = { id: uuidv4(), ...principal, createdAt: this.now() };
    this.byId.set(record.id, record);
    return { ...record };
  }

  async updateRole(id: string, role: Role): Promise<PrincipalRecord | null> {
    const record = this.byId.get(id);
    if (!record) return null;
    record.role = role;
    return { ...record };
  }
}

// ── Assignments ───────────────────────────────────────────────────────

export class MemoryAssignmentStore implements AssignmentStore {
  private readonly byId = new Map<string, Assignment>();
  private readonly byKey = new Map<string, string>();
  private readonly removeListeners: Array<(id: string) => void> = [];

  constructor(private readonly now: Clock = () => new Date()) {}

  /** Called with the id of every removed assignment */
  onRemove(listener: (id: string) => void): void {
    this.removeListeners.push(listener);
  }

  async getOrCreate(key: AssignmentNaturalKey): Promise<GetOrCreateResult> {
    const naturalKey = naturalKeyOf(key);
    const existingId = this.byKey.get(naturalKey);
    const existing = existingId === undefined ? undefined : this.byId.get(existingId);
    if (existing) {
      return { assignment: copyAssignment(existing), created: false };
    }

    const now = this.now();
    const assignment: Assignment = {
      id: uuidv4(),
      title: key.title,
      description: key.description,
      dueAt: new Date(key.dueAt),
      ownerId: key.ownerId,
      createdAt: now,
      updatedAt: now,
    };
    this.byId.set(assignment.id, assignment);
    this.byKey.set(naturalKey, assignment.id);
    return { assignment: copyAssignment(assignment), created: true };
  }

  async findById(id: string): Promise<Assignment | null> {
    const assignment = this.byId.get(id);
    return assignment ? copyAssignment(assignment) : null;
  }

  async findByNaturalKey(key: AssignmentNaturalKey): Promise<Assignment | null> {
    const id = this.byKey.get(naturalKeyOf(key));
    return id === undefined ? null : this.findById(id);
  }

  async findByOwner(ownerId: string): Promise<Assignment[]> {
    return this.sorted().filter((assignment) => assignment.ownerId === ownerId);
  }

  async list(): Promise<Assignment[]> {
    return this.sorted();
  }

  async update(id: string, patch: AssignmentPatch): Promise<Assignment | null> {
    const assignment = this.byId.get(id);
    if (!assignment) return null;

    const oldKey = naturalKeyOf(assignment);
    const newKey = naturalKeyOf({ ...patch, ownerId: assignment.ownerId });
    const holder = this.byKey.get(newKey);
    if (holder !== undefined && holder !== id) {
      throw new Conflict('An assignment with this title, description and due date already exists.');
    }

    this.byKey.delete(oldKey);
    assignment.title = patch.title;
    assignment.description = patch.description;
    assignment.dueAt = new Date(patch.dueAt);
    assignment.updatedAt = this.now();
    this.byKey.set(newKey, id);
    return copyAssignment(assignment);
  }

  async remove(id: string): Promise<boolean> {
    const assignment = this.byId.get(id);
    if (!assignment) return false;
    this.byId.delete(id);
    this.byKey.delete(naturalKeyOf(assignment));
    for (const listener of this.removeListeners) listener(id);
    return true;
  }

  get size(): number {
    return this.byId.size;
  }

  private sorted(): Assignment[] {
    // Reverse insertion order first so equal timestamps list newest first
    return [...this.byId.values()]
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(copyAssignment);
  }
}

// ── Submissions ───────────────────────────────────────────────────────

export class MemorySubmissionStore implements SubmissionStore {
  private readonly rows: Submission[] = [];

  constructor(private readonly now: Clock = () => new Date()) {}

  async insert(submission: NewSubmission): Promise<Submission> {
    const row: Submission = {
      id: uuidv4(),
      ...submission,
      file: { ...submission.file },
      submittedAt: this.now(),
      notified: false,
    };
    this.rows.push(row);
    return copySubmission(row);
  }

  async findById(id: string): Promise<Submission | null> {
    const row = this.rows.find((submission) => submission.id === id);
    return row ? copySubmission(row) : null;
  }

  async listForAssignment(assignmentId: string): Promise<Submission[]> {
    return this.rows.filter((row) => row.assignmentId === assignmentId).map(copySubmission);
  }

  async listPendingNotification(assignmentId: string): Promise<Submission[]> {
    return this.rows
      .filter((row) => row.assignmentId === assignmentId && !row.notified)
      .map(copySubmission);
  }

  async markNotified(id: string): Promise<void> {
    const row = this.rows.find((submission) => submission.id === id);
    if (row) row.notified = true;
  }

  removeForAssignment(assignmentId: string): void {
    for (let i = this.rows.length - 1; i >= 0; i--) {
      if (this.rows[i].assignmentId === assignmentId) this.rows.splice(i, 1);
    }
  }
}

// ── Audit ─────────────────────────────────────────────────────────────

export class MemoryAuditStore implements AuditStore {
  private readonly events: AuditEvent[] = [];

  async append(event: AuditEvent): Promise<void> {
    this.events.push({ ...event, metadata: { ...event.metadata } });
  }

  async list(limit: number): Promise<AuditEvent[]> {
    return this.events.slice(-limit).reverse();
  }

  get size(): number {
    return this.events.length;
  }
}

export interface MemoryStores extends Stores {
  principals: MemoryPrincipalStore;
  assignments: MemoryAssignmentStore;
  submissions: MemorySubmissionStore;
  audit: MemoryAuditStore;
}

/**
 * A linked set of stores. Removing an assignment removes its
 * submissions, as the database's ON DELETE CASCADE does.
 */
export function createMemoryStores(now?: Clock): MemoryStores {
  const assignments = new MemoryAssignmentStore(now);
  const submissions = new MemorySubmissionStore(now);
  assignments.onRemove((id) => submissions.removeForAssignment(id));
  return {
    principals: new MemoryPrincipalStore(now),
    assignments,
    submissions,
    audit: new MemoryAuditStore(),
  };
}
