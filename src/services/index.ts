// =============================================================================
// COURSEWORK — Service Wiring
//
// Builds every service from its collaborators. Nothing here reads the
// environment: the server passes config in, tests pass their own values.
// =============================================================================

import { Stores } from '../types/store';
import { AssignmentService } from './assignments';
import { AuditTrail } from './audit';
import { FileStore } from './files';
import { AssignmentImporter } from './ingestion';
import { ContactService, Notifier } from './notifications';
import { PrincipalRegistry } from './registry';
import { SubmissionService } from './submissions';

export interface ServiceOptions {
  bcryptRounds: number;
  passwordMinLength: number;
  importMaxRows: number;
  importConcurrency: number;
  submissionMaxBytes: number;
  contactRecipient: string;
}

export interface Collaborators {
  stores: Stores;
  files: FileStore;
  notifier: Notifier;
}

export interface Services {
  audit: AuditTrail;
  registry: PrincipalRegistry;
  assignments: AssignmentService;
  importer: AssignmentImporter;
  submissions: SubmissionService;
  contact: ContactService;
}

export function createServices(collaborators: Collaborators, options: ServiceOptions): Services {
  const { stores, files, notifier } = collaborators;
  const audit = new AuditTrail(stores.audit);

  return {
    audit,
    registry: new PrincipalRegistry(stores.principals, audit, {
      bcryptRounds: options.bcryptRounds,
      policy: { minLength: options.passwordMinLength },
    }),
    assignments: new AssignmentService(stores.assignments, audit),
    importer: new AssignmentImporter(
      { assignments: stores.assignments, audit },
      { maxRows: options.importMaxRows, concurrency: options.importConcurrency },
    ),
    submissions: new SubmissionService(
      {
        assignments: stores.assignments,
        submissions: stores.submissions,
        principals: stores.principals,
        files,
        notifier,
        audit,
      },
      options.submissionMaxBytes,
    ),
    contact: new ContactService(notifier, options.contactRecipient),
  };
}
