// =============================================================================
// COURSEWORK — Assignment Service
//
// Single-record path: pipeline → guard → store → audit. The same guard
// and the same atomic getOrCreate serve the bulk importer.
// =============================================================================

import { isPermitted, Operation, Requirement, requireOperation, requireOwnership } from '../../authorization/guard';
import { NotFound } from '../../errors';
import { RawFields } from '../../types/pipeline';
import { Assignment, Principal } from '../../types/records';
import { AssignmentStore } from '../../types/store';
import { AuditTrail } from '../audit';
import { assignmentForm } from '../pipeline/forms';
import { validateOrThrow } from '../pipeline/validate';

/** What the actor may do with one assignment, for the client to show or hide */
export interface AssignmentPermissions {
  canEdit: boolean;
  canDelete: boolean;
  canViewSubmissions: boolean;
  canSubmit: boolean;
}

export class AssignmentService {
  constructor(
    private readonly assignments: AssignmentStore,
    private readonly audit: AuditTrail,
  ) {}

  async list(actor: Principal): Promise<Assignment[]> {
    requireOperation(actor, 'assignment.read');
    return this.assignments.list();
  }

  /** Assignments the actor owns */
  async listMine(actor: Principal): Promise<Assignment[]> {
    requireOperation(actor, 'assignment.read');
    return this.assignments.findByOwner(actor.id);
  }

  async get(actor: Principal, id: string): Promise<Assignment> {
    requireOperation(actor, 'assignment.read');
    const assignment = await this.assignments.findById(id);
    if (!assignment) {
      throw new NotFound('Assignment');
    }
    return assignment;
  }

  permissions(actor: Principal, assignment: Assignment): AssignmentPermissions {
    const owned: Requirement = { kind: 'ownership', resource: assignment };
    const may = (operation: Operation, ownerOnly: boolean): boolean =>
      ownerOnly
        ? isPermitted(actor, { kind: 'operation', operation }, owned)
        : isPermitted(actor, { kind: 'operation', operation });
    return {
      canEdit: may('assignment.update', true),
      canDelete: may('assignment.delete', true),
      canViewSubmissions: may('submission.list', true),
      canSubmit: may('submission.create', false),
    };
  }

  /**
   * Create one assignment owned by the actor. A natural key that already
   * exists is reported by the form; a racing duplicate that slips past
   * the form resolves to the stored record.
   */
  async create(actor: Principal, raw: RawFields): Promise<Assignment> {
    requireOperation(actor, 'assignment.create');
    const draft = await validateOrThrow(
      assignmentForm({ assignments: this.assignments, ownerId: actor.id }),
      raw,
    );

    const { assignment, created } = await this.assignments.getOrCreate({
      ...draft,
      ownerId: actor.id,
    });

    if (created) {
      await this.audit.record({
        eventType: 'assignment.create',
        description: `Created assignment "${assignment.title}"`,
        actor,
        targetType: 'assignment',
        targetId: assignment.id,
      });
    }
    return assignment;
  }

  async update(actor: Principal, id: string, raw: RawFields): Promise<Assignment> {
    requireOperation(actor, 'assignment.update');
    const existing = await this.assignments.findById(id);
    if (!existing) {
      throw new NotFound('Assignment');
    }
    requireOwnership(actor, existing);

    const draft = await validateOrThrow(
      assignmentForm({ assignments: this.assignments, ownerId: existing.ownerId, excludeId: id }),
      raw,
    );
    const updated = await this.assignments.update(id, draft);
    if (!updated) {
      throw new NotFound('Assignment');
    }

    await this.audit.record({
      eventType: 'assignment.update',
      description: `Updated assignment "${updated.title}"`,
      actor,
      targetType: 'assignment',
      targetId: id,
    });
    return updated;
  }

  async remove(actor: Principal, id: string): Promise<void> {
    requireOperation(actor, 'assignment.delete');
    const existing = await this.assignments.findById(id);
    if (!existing) {
      throw new NotFound('Assignment');
    }
    requireOwnership(actor, existing);

    const removed = await this.assignments.remove(id);
    if (!removed) {
      throw new NotFound('Assignment');
    }

    await this.audit.record({
      eventType: 'assignment.delete',
      description: `Deleted assignment "${existing.title}"`,
      actor,
      targetType: 'assignment',
      targetId: id,
    });
  }
}
