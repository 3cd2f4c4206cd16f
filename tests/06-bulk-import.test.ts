// =============================================================================
// COURSEWORK — Test Suite 06: Bulk Import
//
// Importer behaviour against in-memory stores, then the HTTP endpoint.
// =============================================================================

import request from 'supertest';
import { Conflict, MissingColumn, StoreUnavailable } from '../src/errors';
import { AuditTrail } from '../src/services/audit';
import { AssignmentImporter, ROW_NOT_SAVED_MESSAGE } from '../src/services/ingestion';
import { createMemoryStores, MemoryAssignmentStore, MemoryStores } from '../src/store/memory';
import { ImportReport } from '../src/types/ingestion';
import { AssignmentNaturalKey } from '../src/types/records';
import { GetOrCreateResult } from '../src/types/store';
import {
  bearer,
  buildContext,
  createUser,
  csv,
  fiveRowBatch,
  HEADER,
  principal,
} from './helpers';

function setup(): { stores: MemoryStores; importer: AssignmentImporter } {
  const stores = createMemoryStores();
  const importer = new AssignmentImporter({
    assignments: stores.assignments,
    audit: new AuditTrail(stores.audit),
  });
  return { stores, importer };
}

/** Row outcomes without generated ids, for comparing two runs */
function shape(report: ImportReport): Array<{ rowIndex: number; status: string }> {
  return report.outcomes.map(({ rowIndex, status }) => ({ rowIndex, status }));
}

describe('Bulk Import', () => {
  const teacher = principal('teacher', 'teacher-1');

  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  // ── Row-level behaviour ───────────────────────────────────────────────

  describe('rows', () => {
    test('one bad date fails its row only', async () => {
      const { stores, importer } = setup();

      const report = await importer.importSource(fiveRowBatch(3), teacher);

      expect(report.createdCount).toBe(4);
      expect(report.skippedCount).toBe(0);
      expect(report.failedCount).toBe(1);
      expect(report.rowCount).toBe(5);
      expect(report.perRowErrors).toEqual([{ rowIndex: 3, errors: { date: 'invalid format' } }]);
      expect(report.aborted).toBe(false);
      expect(stores.assignments.size).toBe(4);
    });

    test('re-uploading an imported batch skips every row', async () => {
      const { stores, importer } = setup();
      const first = await importer.importSource(fiveRowBatch(), teacher);
      expect(first.createdCount).toBe(5);

      const second = await importer.importSource(fiveRowBatch(), teacher);
      expect(second.createdCount).toBe(0);
      expect(second.skippedCount).toBe(5);
      expect(second.perRowErrors).toEqual([]);
      expect(stores.assignments.size).toBe(5);

      // Skipped rows point at the records the first run created
      const ids = (r: ImportReport) =>
        r.outcomes.map((o) => (o.status === 'failed' ? null : o.assignmentId));
      expect(ids(second)).toEqual(ids(first));
    });

    test('rows become assignments owned by the actor with a UTC due date', async () => {
      const { stores, importer } = setup();
      await importer.importSource(
        csv([HEADER, ['Poem', 'Learn the poem by heart', '2024-09-15', '08:45']]),
        teacher,
      );

      const [assignment] = await stores.assignments.findByOwner('teacher-1');
      expect(assignment.title).toBe('Poem');
      expect(assignment.description).toBe('Learn the poem by heart');
      expect(assignment.dueAt.toISOString()).toBe('2024-09-15T08:45:00.000Z');
    });

    test('duplicate rows inside one batch create once', async () => {
      const { stores, importer } = setup();
      const row = ['Quiz', 'Unit 2 quiz', '2024-03-01', '10:00'];

      const report = await importer.importSource(csv([HEADER, row, row]), teacher);

      expect(shape(report)).toEqual([
        { rowIndex: 1, status: 'created' },
        { rowIndex: 2, status: 'skipped' },
      ]);
      expect(stores.assignments.size).toBe(1);
    });

    test('columns are matched by name, extras are ignored', async () => {
      const { stores, importer } = setup();
      const source = csv([
        ['Time', 'notes', 'DATE', 'Description', 'title'],
        ['13:15', 'ignored', '2024-02-02', 'Map the river', 'Geography'],
      ]);

      const report = await importer.importSource(source, teacher);

      expect(report.createdCount).toBe(1);
      const [assignment] = await stores.assignments.list();
      expect(assignment.title).toBe('Geography');
      expect(assignment.dueAt.toISOString()).toBe('2024-02-02T13:15:00.000Z');
    });

    test('short rows and forbidden words are row failures', async () => {
      const { importer } = setup();
      const source = csv([
        HEADER,
        ['Only a title'],
        ['Free money', 'Totally not spam', '2024-01-10', '12:00'],
        ['Fine', 'A real task', '2024-01-11', '12:00'],
      ]);

      const report = await importer.importSource(source, teacher);

      expect(report.perRowErrors).toEqual([
        {
          rowIndex: 1,
          errors: {
            description: 'This field is required.',
            date: 'This field is required.',
            time: 'This field is required.',
          },
        },
        { rowIndex: 2, errors: { _record: 'The assignment contains a forbidden word: spam' } },
      ]);
      expect(report.createdCount).toBe(1);
    });

    test('blank lines are neither processed nor numbered', async () => {
      const { importer } = setup();
      const source = 'title,description,date,time\n\nA,First,2024-01-01,09:00\n\nB,Second,2024-01-02,bad\n';

      const report = await importer.importSource(source, teacher);

      expect(report.rowCount).toBe(2);
      expect(report.perRowErrors).toEqual([{ rowIndex: 2, errors: { time: 'invalid format' } }]);
    });

    test('an empty batch reports nothing', async () => {
      const { importer } = setup();
      const report = await importer.importSource(csv([HEADER]), teacher);
      expect(report).toEqual({
        createdCount: 0,
        skippedCount: 0,
        failedCount: 0,
        rowCount: 0,
        perRowErrors: [],
        outcomes: [],
        aborted: false,
      });
    });
  });

  // ── Whole-batch failures ──────────────────────────────────────────────

  describe('structure', () => {
    test('a missing column fails the batch before any row', async () => {
      const { stores, importer } = setup();
      const source = csv([
        ['title', 'description', 'date'],
        ['Essay', 'Write it', '2024-05-01'],
      ]);

      await expect(importer.importSource(source, teacher)).rejects.toThrow(MissingColumn);
      await expect(importer.importSource(source, teacher)).rejects.toThrow(
        'Missing required column(s): time',
      );
      expect(stores.assignments.size).toBe(0);
      expect(stores.audit.size).toBe(0);
    });

    test('every missing column is named', async () => {
      const { importer } = setup();
      try {
        await importer.importSource('name,when\nx,y\n', teacher);
        throw new Error('expected MissingColumn');
      } catch (err) {
        expect(err).toBeInstanceOf(MissingColumn);
        if (err instanceof MissingColumn) {
          expect(err.missing).toEqual(['title', 'description', 'date', 'time']);
        }
      }
    });

    test('the row limit applies per import', async () => {
      const { importer } = setup();
      await expect(importer.importSource(fiveRowBatch(), teacher, { maxRows: 4 })).rejects.toThrow(
        'Source has 5 rows; the limit is 4',
      );
    });
  });

  // ── Authorization ─────────────────────────────────────────────────────

  describe('authorization', () => {
    test('a student actor gets a denial on every valid row and nothing is written', async () => {
      const { stores, importer } = setup();

      const report = await importer.importSource(fiveRowBatch(2), principal('student', 'student-1'));

      expect(report.createdCount).toBe(0);
      expect(report.failedCount).toBe(5);
      expect(report.perRowErrors[0]).toEqual({ rowIndex: 1, errors: { _record: 'Insufficient permissions' } });
      // Validation runs before the guard
      expect(report.perRowErrors[1]).toEqual({ rowIndex: 2, errors: { date: 'invalid format' } });
      expect(stores.assignments.size).toBe(0);
      expect(stores.audit.size).toBe(0);
    });

    test('a teacher cannot import on behalf of another teacher', async () => {
      const { stores, importer } = setup();

      const report = await importer.importSource(fiveRowBatch(), teacher, { ownerId: 'teacher-2' });

      expect(report.failedCount).toBe(5);
      expect(report.perRowErrors[0].errors).toEqual({
        _record: 'Only the owner may perform this operation',
      });
      expect(stores.assignments.size).toBe(0);
    });

    test('an admin imports on behalf of a teacher', async () => {
      const { stores, importer } = setup();

      const report = await importer.importSource(fiveRowBatch(), principal('admin', 'admin-1'), {
        ownerId: 'teacher-1',
      });

      expect(report.createdCount).toBe(5);
      expect(await stores.assignments.findByOwner('teacher-1')).toHaveLength(5);
      expect(await stores.assignments.findByOwner('admin-1')).toHaveLength(0);
    });
  });

  // ── Concurrency, cancellation, store failure ──────────────────────────

  describe('execution', () => {
    test('parallel processing yields the same report as sequential', async () => {
      const sequential = await setup().importer.importSource(fiveRowBatch(3), teacher, { concurrency: 1 });
      const parallel = await setup().importer.importSource(fiveRowBatch(3), teacher, { concurrency: 4 });

      expect(shape(parallel)).toEqual(shape(sequential));
      expect(parallel.perRowErrors).toEqual(sequential.perRowErrors);
      expect(parallel.createdCount).toBe(4);
    });

    test('overlapping imports of the same batch create each assignment once', async () => {
      const { stores, importer } = setup();

      const [a, b] = await Promise.all([
        importer.importSource(fiveRowBatch(), teacher, { concurrency: 3 }),
        importer.importSource(fiveRowBatch(), teacher, { concurrency: 2 }),
      ]);

      expect(a.createdCount + b.createdCount).toBe(5);
      expect(a.skippedCount + b.skippedCount).toBe(5);
      expect(stores.assignments.size).toBe(5);
    });

    test('an aborted signal stops before the first row', async () => {
      const { stores, importer } = setup();
      const controller = new AbortController();
      controller.abort();

      const report = await importer.importSource(fiveRowBatch(), teacher, { signal: controller.signal });

      expect(report.aborted).toBe(true);
      expect(report.rowCount).toBe(0);
      expect(stores.assignments.size).toBe(0);
    });

    test('aborting mid-batch keeps the rows already committed', async () => {
      const stores = createMemoryStores();
      const controller = new AbortController();
      const assignments = new MemoryAssignmentStore();
      let calls = 0;
      const original = assignments.getOrCreate.bind(assignments);
      assignments.getOrCreate = async (key: AssignmentNaturalKey): Promise<GetOrCreateResult> => {
        calls++;
        const result = await original(key);
        if (calls === 2) controller.abort();
        return result;
      };
      const importer = new AssignmentImporter({ assignments, audit: new AuditTrail(stores.audit) });

      const report = await importer.importSource(fiveRowBatch(), teacher, { signal: controller.signal });

      expect(report.aborted).toBe(true);
      expect(shape(report)).toEqual([
        { rowIndex: 1, status: 'created' },
        { rowIndex: 2, status: 'created' },
      ]);
      expect(assignments.size).toBe(2);
    });

    test('a store outage aborts the batch and carries the partial report', async () => {
      const stores = createMemoryStores();
      const assignments = new MemoryAssignmentStore();
      let calls = 0;
      const original = assignments.getOrCreate.bind(assignments);
      assignments.getOrCreate = async (key: AssignmentNaturalKey): Promise<GetOrCreateResult> => {
        calls++;
        if (calls === 3) throw new StoreUnavailable('Database unavailable');
        return original(key);
      };
      const importer = new AssignmentImporter({ assignments, audit: new AuditTrail(stores.audit) });

      try {
        await importer.importSource(fiveRowBatch(), teacher);
        throw new Error('expected StoreUnavailable');
      } catch (err) {
        expect(err).toBeInstanceOf(StoreUnavailable);
        if (err instanceof StoreUnavailable) {
          expect(err.httpStatus).toBe(503);
          expect(err.details).toMatchObject({
            partialReport: { createdCount: 2, rowCount: 2, aborted: false },
          });
        }
      }
      // Rows committed before the outage stay
      expect(assignments.size).toBe(2);
      expect(stores.audit.size).toBe(0);
    });

    test('any other store error fails its row and the batch goes on', async () => {
      const stores = createMemoryStores();
      const assignments = new MemoryAssignmentStore();
      let calls = 0;
      const original = assignments.getOrCreate.bind(assignments);
      assignments.getOrCreate = async (key: AssignmentNaturalKey): Promise<GetOrCreateResult> => {
        calls++;
        if (calls === 2) throw new Error('invalid byte sequence');
        return original(key);
      };
      const importer = new AssignmentImporter({ assignments, audit: new AuditTrail(stores.audit) });

      const report = await importer.importSource(fiveRowBatch(), teacher);

      expect(shape(report)).toEqual([
        { rowIndex: 1, status: 'created' },
        { rowIndex: 2, status: 'failed' },
        { rowIndex: 3, status: 'created' },
        { rowIndex: 4, status: 'created' },
        { rowIndex: 5, status: 'created' },
      ]);
      expect(report.perRowErrors).toEqual([{ rowIndex: 2, errors: { _record: ROW_NOT_SAVED_MESSAGE } }]);
      expect(assignments.size).toBe(4);
      expect(errorSpy).toHaveBeenCalledWith('[Import] Row 2 rejected by the store: invalid byte sequence');
      expect(stores.audit.size).toBe(1);
    });

    test('an application error from the store keeps its message on the row', async () => {
      const stores = createMemoryStores();
      const assignments = new MemoryAssignmentStore();
      const original = assignments.getOrCreate.bind(assignments);
      assignments.getOrCreate = async (key: AssignmentNaturalKey): Promise<GetOrCreateResult> => {
        if (key.title === 'Essay 4') throw new Conflict('Assignment changed while saving');
        return original(key);
      };
      const importer = new AssignmentImporter({ assignments, audit: new AuditTrail(stores.audit) });

      const report = await importer.importSource(fiveRowBatch(), teacher);

      expect(report.createdCount).toBe(4);
      expect(report.perRowErrors).toEqual([
        { rowIndex: 4, errors: { _record: 'Assignment changed while saving' } },
      ]);
    });

    test('a completed batch is summarised by one audit event', async () => {
      const { stores, importer } = setup();
      await importer.importSource(fiveRowBatch(3), teacher);

      const [event] = await stores.audit.list(10);
      expect(stores.audit.size).toBe(1);
      expect(event.eventType).toBe('assignment.import');
      expect(event.actorId).toBe('teacher-1');
      expect(event.metadata).toEqual({
        ownerId: 'teacher-1',
        createdCount: 4,
        skippedCount: 0,
        failedCount: 1,
        aborted: false,
      });
      expect(AuditTrail.verify(event)).toBe(true);
    });
  });

  // ── HTTP ──────────────────────────────────────────────────────────────

  describe('HTTP', () => {
    test('POST /api/assignments/import returns the report', async () => {
      const ctx = buildContext();
      const carol = await createUser(ctx, 'carol', 'teacher');

      const res = await request(ctx.app)
        .post('/api/assignments/import')
        .set(bearer(carol))
        .attach('csv_file', Buffer.from(fiveRowBatch(3)), { filename: 'batch.csv', contentType: 'text/csv' });

      expect(res.status).toBe(200);
      expect(res.body.report.createdCount).toBe(4);
      expect(res.body.report.perRowErrors).toEqual([{ rowIndex: 3, errors: { date: 'invalid format' } }]);

      const mine = await request(ctx.app).get('/api/assignments/mine').set(bearer(carol));
      expect(mine.body.assignments).toHaveLength(4);
    });

    test('a file that is not CSV is rejected by the upload form', async () => {
      const ctx = buildContext();
      const carol = await createUser(ctx, 'carol', 'teacher');

      const res = await request(ctx.app)
        .post('/api/assignments/import')
        .set(bearer(carol))
        .attach('csv_file', Buffer.from('hello'), { filename: 'notes.txt', contentType: 'text/plain' });

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual({ csv_file: 'Please upload a valid CSV file.' });
      expect(res.body.input).toEqual({ csv_file: 'notes.txt' });
    });

    test('a missing column answers 400 MISSING_COLUMN', async () => {
      const ctx = buildContext();
      const carol = await createUser(ctx, 'carol', 'teacher');

      const res = await request(ctx.app)
        .post('/api/assignments/import')
        .set(bearer(carol))
        .attach('csv_file', Buffer.from('title,description\nA,B\n'), {
          filename: 'batch.csv',
          contentType: 'text/csv',
        });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: 'Missing required column(s): date, time',
        code: 'MISSING_COLUMN',
        details: { missing: ['date', 'time'] },
      });
      expect(ctx.stores.assignments.size).toBe(0);
    });

    test('an admin names the owner; an unknown owner is 404', async () => {
      const ctx = buildContext();
      const root = await createUser(ctx, 'root', 'admin');
      const carol = await createUser(ctx, 'carol', 'teacher');

      const ok = await request(ctx.app)
        .post('/api/assignments/import')
        .set(bearer(root))
        .field('ownerId', carol.principal.id)
        .attach('csv_file', Buffer.from(fiveRowBatch()), { filename: 'batch.csv', contentType: 'text/csv' });
      expect(ok.status).toBe(200);
      expect(ok.body.report.createdCount).toBe(5);
      expect(await ctx.stores.assignments.findByOwner(carol.principal.id)).toHaveLength(5);

      const missing = await request(ctx.app)
        .post('/api/assignments/import')
        .set(bearer(root))
        .field('ownerId', 'no-such-user')
        .attach('csv_file', Buffer.from(fiveRowBatch()), { filename: 'batch.csv', contentType: 'text/csv' });
      expect(missing.status).toBe(404);
      expect(missing.body.error).toBe('Owner not found');
    });
  });
});
