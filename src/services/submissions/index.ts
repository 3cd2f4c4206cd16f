// =============================================================================
// COURSEWORK — Submission Service
//
// Anyone signed in may submit to any assignment. The owner is told about
// each submission; a delivery failure leaves `notified` false until the
// owner asks for a resend. Nothing retries on its own.
// =============================================================================

import { requireOperation, requireOwnership } from '../../authorization/guard';
import { NotFound } from '../../errors';
import { RawFields } from '../../types/pipeline';
import { Assignment, FileRef, Principal, Submission } from '../../types/records';
import { AssignmentStore, PrincipalStore, SubmissionStore } from '../../types/store';
import { AuditTrail } from '../audit';
import { FileStore } from '../files';
import { Notifier } from '../notifications';
import { submissionForm } from '../pipeline/forms';
import { validateOrThrow } from '../pipeline/validate';

export interface SubmissionDeps {
  assignments: AssignmentStore;
  submissions: SubmissionStore;
  principals: PrincipalStore;
  files: FileStore;
  notifier: Notifier;
  audit: AuditTrail;
}

export interface SubmissionFile {
  file: FileRef;
  content: Buffer;
}

export interface ResendResult {
  attempted: number;
  delivered: number;
}

export class SubmissionService {
  constructor(
    private readonly deps: SubmissionDeps,
    private readonly maxFileBytes: number,
  ) {}

  async submit(actor: Principal, assignmentId: string, raw: RawFields): Promise<Submission> {
    requireOperation(actor, 'submission.create');
    const assignment = await this.findAssignment(assignmentId);
    const draft = await validateOrThrow(submissionForm(this.maxFileBytes), raw);

    const file = await this.deps.files.save(draft.file);
    const submission = await this.deps.submissions.insert({
      assignmentId,
      submitterId: actor.id,
      submitterName: draft.submitterName,
      file,
    });

    await this.deps.audit.record({
      eventType: 'submission.create',
      description: `${draft.submitterName} submitted "${file.originalName}" for "${assignment.title}"`,
      actor,
      targetType: 'submission',
      targetId: submission.id,
      metadata: { assignmentId },
    });

    const notified = await this.notifyOwner(assignment, submission);
    return { ...submission, notified };
  }

  async listForAssignment(actor: Principal, assignmentId: string): Promise<Submission[]> {
    requireOperation(actor, 'submission.list');
    const assignment = await this.findAssignment(assignmentId);
    requireOwnership(actor, assignment);
    return this.deps.submissions.listForAssignment(assignmentId);
  }

  /** Try once more for every submission whose notification never went out. */
  async resendPending(actor: Principal, assignmentId: string): Promise<ResendResult> {
    requireOperation(actor, 'submission.notify');
    const assignment = await this.findAssignment(assignmentId);
    requireOwnership(actor, assignment);

    const pending = await this.deps.submissions.listPendingNotification(assignmentId);
    let delivered = 0;
    for (const submission of pending) {
      if (await this.notifyOwner(assignment, submission)) delivered++;
    }
    return { attempted: pending.length, delivered };
  }

  async downloadFile(actor: Principal, assignmentId: string, submissionId: string): Promise<SubmissionFile> {
    requireOperation(actor, 'submission.list');
    const assignment = await this.findAssignment(assignmentId);
    requireOwnership(actor, assignment);

    const submission = await this.deps.submissions.findById(submissionId);
    if (!submission || submission.assignmentId !== assignmentId) {
      throw new NotFound('Submission');
    }
    const content = await this.deps.files.read(submission.file.storageRef);
    if (!content) {
      console.error(`[Files] Missing stored file ${submission.file.storageRef} for submission ${submission.id}`);
      throw new NotFound('File');
    }
    return { file: submission.file, content };
  }

  private async findAssignment(id: string): Promise<Assignment> {
    const assignment = await this.deps.assignments.findById(id);
    if (!assignment) {
      throw new NotFound('Assignment');
    }
    return assignment;
  }

  private async notifyOwner(assignment: Assignment, submission: Submission): Promise<boolean> {
    const owner = await this.deps.principals.findById(assignment.ownerId);
    if (!owner || owner.email === '') {
      console.warn(`[Notify] No address for the owner of assignment ${assignment.id}`);
      return false;
    }

    try {
      await this.deps.notifier.send({
        to: owner.email,
        subject: `New submission for ${assignment.title}`,
        body:
          `${submission.submitterName} submitted "${submission.file.originalName}" ` +
          `on ${submission.submittedAt.toISOString()}.`,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Notify] Delivery failed for submission ${submission.id}: ${message}`);
      return false;
    }

    await this.deps.submissions.markNotified(submission.id);
    return true;
  }
}
