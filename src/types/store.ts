// =============================================================================
// COURSEWORK — Store Interfaces
//
// The core talks to persistence only through these interfaces. Two
// implementations ship: PostgreSQL (src/store/postgres.ts) and in-memory
// (src/store/memory.ts). Both must make getOrCreate atomic per natural key:
// duplicate detection belongs to the store, never to a read-then-write in
// the caller.
// =============================================================================

import {
  Assignment,
  AssignmentNaturalKey,
  AuditEvent,
  FileRef,
  PrincipalRecord,
  Submission,
} from './records';
import { Role } from './roles';

export interface NewPrincipal {
  credentialRef: string;
  passwordHash: string;
  role: Role;
  displayName: string;
  email: string;
}

export interface PrincipalStore {
  findById(id: string): Promise<PrincipalRecord | null>;
  findByCredentialRef(credentialRef: string): Promise<PrincipalRecord | null>;
  list(): Promise<PrincipalRecord[]>;
  /** Throws DuplicateIdentity when the credential reference is taken. */
  insert(principal: NewPrincipal): Promise<PrincipalRecord>;
  updateRole(id: string, role: Role): Promise<PrincipalRecord | null>;
}

export interface GetOrCreateResult {
  assignment: Assignment;
  created: boolean;
}

export interface AssignmentPatch {
  title: string;
  description: string;
  dueAt: Date;
}

export interface AssignmentStore {
  /**
   * Atomically return the assignment with this natural key, creating it
   * when absent. Concurrent callers with the same key observe exactly one
   * `created: true`.
   */
  getOrCreate(key: AssignmentNaturalKey): Promise<GetOrCreateResult>;
  findById(id: string): Promise<Assignment | null>;
  findByNaturalKey(key: AssignmentNaturalKey): Promise<Assignment | null>;
  findByOwner(ownerId: string): Promise<Assignment[]>;
  /** Newest first */
  list(): Promise<Assignment[]>;
  /** Throws Conflict when the patch collides with another natural key. */
  update(id: string, patch: AssignmentPatch): Promise<Assignment | null>;
  remove(id: string): Promise<boolean>;
}

export interface NewSubmission {
  assignmentId: string;
  submitterId: string;
  submitterName: string;
  file: FileRef;
}

export interface SubmissionStore {
  insert(submission: NewSubmission): Promise<Submission>;
  findById(id: string): Promise<Submission | null>;
  /** Oldest first */
  listForAssignment(assignmentId: string): Promise<Submission[]>;
  listPendingNotification(assignmentId: string): Promise<Submission[]>;
  markNotified(id: string): Promise<void>;
}

export interface AuditStore {
  append(event: AuditEvent): Promise<void>;
  list(limit: number): Promise<AuditEvent[]>;
}

export interface Stores {
  principals: PrincipalStore;
  assignments: AssignmentStore;
  submissions: SubmissionStore;
  audit: AuditStore;
}
