// =============================================================================
// COURSEWORK — Main Server
// Assignment management: accounts and roles, assignments, bulk CSV import,
// file submissions.
// =============================================================================

import { createApp } from './app';
import { config } from './config';
import { createPool } from './db/pool';
import { DiskFileStore } from './services/files';
import { ConsoleNotifier } from './services/notifications';
import { createServices } from './services';
import { createMemoryStores } from './store/memory';
import { createPostgresStores } from './store/postgres';
import { Stores } from './types/store';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  let stores: Stores;
  let ping: (() => Promise<void>) | undefined;

  if (config.store.driver === 'postgres') {
    const pool = createPool(config.db.connectionString);
    stores = createPostgresStores(pool);
    ping = async () => {
      await pool.query('SELECT 1');
    };
  } else {
    console.warn('[Server] Using in-memory stores; data is lost on restart');
    stores = createMemoryStores();
  }

  const services = createServices(
    {
      stores,
      files: new DiskFileStore(config.uploads.directory),
      notifier: new ConsoleNotifier(),
    },
    {
      bcryptRounds: config.auth.bcryptRounds,
      passwordMinLength: config.auth.passwordMinLength,
      importMaxRows: config.import.maxRows,
      importConcurrency: config.import.concurrency,
      submissionMaxBytes: config.uploads.submissionMaxBytes,
      contactRecipient: config.contact.recipient,
    },
  );

  const { username, password } = config.auth.bootstrapAdmin;
  if (username !== '' && password !== '') {
    await services.registry.ensureBootstrapAdmin(username, password);
  }

  const app = createApp(services, {
    jwtSecret: config.jwt.secret,
    jwtExpirySeconds: config.jwt.expirySeconds,
    importMaxBytes: config.import.maxBytes,
    submissionMaxBytes: config.uploads.submissionMaxBytes,
    rateLimitAuthMax: config.rateLimit.authMax,
    rateLimitApiMax: config.rateLimit.apiMax,
    corsOrigin: config.nodeEnv === 'development' ? '*' : config.cors.origins,
    version: VERSION,
    ping,
  });

  app.listen(config.port, () => {
    console.log(`[Server] Coursework ${VERSION} listening on port ${config.port} (${config.nodeEnv}, store: ${config.store.driver})`);
  });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error('[Server] Failed to start:', message);
  process.exit(1);
});
