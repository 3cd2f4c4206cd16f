// =============================================================================
// COURSEWORK — Test Helpers
//
// Builds an isolated app per suite: in-memory stores, an in-memory file
// store and a notifier that records instead of sending. Nothing leaves
// the process.
// =============================================================================

import { Express } from 'express';
import { createApp } from '../src/app';
import { createServices, Services } from '../src/services';
import { MemoryFileStore } from '../src/services/files';
import { Notifier, OutboundMessage } from '../src/services/notifications';
import { issueToken } from '../src/services/registry';
import { createMemoryStores, MemoryStores } from '../src/store/memory';
import { Principal } from '../src/types/records';
import { Role } from '../src/types/roles';

export const JWT_SECRET = 'test-secret';
export const PASSWORD = 'test-password-42';

/** Records every message; set `failing` to simulate a transport outage */
export class RecordingNotifier implements Notifier {
  readonly sent: OutboundMessage[] = [];
  failing = false;

  async send(message: OutboundMessage): Promise<void> {
    if (this.failing) {
      throw new Error('Mail transport unavailable');
    }
    this.sent.push(message);
  }
}

export interface TestContext {
  app: Express;
  services: Services;
  stores: MemoryStores;
  files: MemoryFileStore;
  notifier: RecordingNotifier;
}

export function buildContext(
  overrides: { importConcurrency?: number; submissionMaxBytes?: number } = {},
): TestContext {
  const stores = createMemoryStores();
  const files = new MemoryFileStore();
  const notifier = new RecordingNotifier();

  const services = createServices(
    { stores, files, notifier },
    {
      bcryptRounds: 4,
      passwordMinLength: 8,
      importMaxRows: 100,
      importConcurrency: overrides.importConcurrency ?? 1,
      submissionMaxBytes: overrides.submissionMaxBytes ?? 1024,
      contactRecipient: 'staff@example.com',
    },
  );

  const app = createApp(services, {
    jwtSecret: JWT_SECRET,
    jwtExpirySeconds: 600,
    importMaxBytes: 64 * 1024,
    submissionMaxBytes: overrides.submissionMaxBytes ?? 1024,
    rateLimitAuthMax: 1000,
    rateLimitApiMax: 1000,
    corsOrigin: '*',
    version: '0.1.0',
  });

  return { app, services, stores, files, notifier };
}

export interface TestUser {
  principal: Principal;
  token: string;
}

/**
 * Create an account with any role. Self-registration cannot create
 * admins, so the account is created as teacher and promoted when needed.
 */
export async function createUser(ctx: TestContext, username: string, role: Role): Promise<TestUser> {
  let principal: Principal;
  if (role === 'admin') {
    const created = await ctx.services.registry.ensureBootstrapAdmin(username, PASSWORD);
    if (!created) throw new Error(`Admin ${username} already exists`);
    principal = created;
  } else {
    principal = await ctx.services.registry.register({
      username,
      email: `${username}@example.com`,
      password1: PASSWORD,
      password2: PASSWORD,
      role,
    });
  }
  return { principal, token: issueToken(principal, { secret: JWT_SECRET, expirySeconds: 600 }) };
}

export function bearer(user: TestUser): { Authorization: string } {
  return { Authorization: `Bearer ${user.token}` };
}

/** A principal that never touches a store, for pure unit tests */
export function principal(role: Role, id = `${role}-1`): Principal {
  return {
    id,
    credentialRef: id,
    role,
    displayName: id,
    email: `${id}@example.com`,
    createdAt: new Date('2024-01-01T00:00:00Z'),
  };
}

/** CSV text from rows of cells; the first row is the header */
export function csv(rows: string[][]): string {
  return rows.map((cells) => cells.join(',')).join('\n') + '\n';
}

export const HEADER = ['title', 'description', 'date', 'time'];

/** Five valid rows; pass a row number to break its date */
export function fiveRowBatch(badDateRow?: number): string {
  const rows = [1, 2, 3, 4, 5].map((n) => [
    `Essay ${n}`,
    `Write essay number ${n}`,
    n === badDateRow ? '2024-13-45' : `2024-05-0${n}`,
    '09:30',
  ]);
  return csv([HEADER, ...rows]);
}
