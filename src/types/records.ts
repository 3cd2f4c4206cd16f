// =============================================================================
// COURSEWORK — Domain Records
//
// Principals, assignments, submissions and the file handles they carry.
// Ownership edges point one way only:
//   Assignment → Principal (owner)
//   Submission → Assignment
//   Submission → Principal (submitter, weak reference for lookup)
// =============================================================================

import { Role } from './roles';

/** An authenticated actor. The only identity the guard ever sees. */
export interface Principal {
  id: string;
  /** Login name; unique across the registry */
  credentialRef: string;
  role: Role;
  displayName: string;
  email: string;
  createdAt: Date;
}

/** Principal as persisted. The hash never leaves the registry. */
export interface PrincipalRecord extends Principal {
  passwordHash: string;
}

export interface Assignment {
  id: string;
  title: string;
  description: string;
  dueAt: Date;
  ownerId: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Field combination identifying "the same" assignment across imports.
 * No two stored assignments share one.
 */
export interface AssignmentNaturalKey {
  title: string;
  description: string;
  dueAt: Date;
  ownerId: string;
}

/** Handle to a stored file, as returned by the file store */
export interface FileRef {
  storageRef: string;
  originalName: string;
  mimeType: string;
  sizeBytes: number;
}

/** File received in a request, before it is stored */
export interface UploadedFile {
  originalName: string;
  mimeType: string;
  sizeBytes: number;
  buffer: Buffer;
}

export interface Submission {
  id: string;
  assignmentId: string;
  submitterId: string;
  submitterName: string;
  file: FileRef;
  submittedAt: Date;
  /** Flipped once the owner notification has been delivered */
  notified: boolean;
}

export type AuditTargetType = 'principal' | 'assignment' | 'submission' | 'import';

export interface AuditEvent {
  id: string;
  eventType: string;
  description: string;
  actorId: string | null;
  actorRole: Role | null;
  targetType: AuditTargetType;
  targetId: string | null;
  metadata: Record<string, unknown>;
  /** SHA-512 over the event content */
  eventHash: string;
  occurredAt: Date;
}
