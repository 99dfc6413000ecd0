/**
 * Integration tests for the row-by-row loader against an in-process store
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { RowLoader } from '../../src/lib/loader/index.js';
import { analyzeExport } from '../../src/lib/pipeline/index.js';
import { logger } from '../../src/utils/logger.js';
import { LoadError, TablePreparationError } from '../../src/utils/errors.js';
import type { SqlResult, SqlStore } from '../../src/lib/store/types.js';
import { MemoryDatabase } from '../helpers/memory-store.js';

const TARGET = { schema: 'survey', table: 'public_health_data' };

function exportWithGenders(genders: string[]) {
  const body = ['Gender;Sleep hours', ...genders.map((gender) => `${gender};7`)].join('\n');
  return analyzeExport(body, ';');
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('RowLoader', () => {
  it('loads every row and verifies the count', async () => {
    const database = new MemoryDatabase();
    const store = await database.connect();
    const { table, mapping } = exportWithGenders(['Female', 'Male', 'Other']);

    const loader = new RowLoader(store, TARGET);
    await loader.prepare();
    const report = await loader.load(table, mapping);

    expect(report).toMatchObject({
      attempted: 3,
      inserted: 3,
      failed: 0,
      failures: [],
      verifiedCount: 3,
    });
    expect(loader.phase).toBe('verified');
    expect(database.rows('survey', 'public_health_data').map((row) => row.gender)).toEqual([
      'Female',
      'Male',
      'Other',
    ]);
    expect(store.commits).toBe(2);
  });

  it('isolates a failing row and keeps the rest', async () => {
    const database = new MemoryDatabase({
      rejectInsert: (row) => (row.gender === 'Bad' ? 'value rejected by constraint' : null),
    });
    const store = await database.connect();
    const { table, mapping } = exportWithGenders(['Female', 'Bad', 'Male']);

    const loader = new RowLoader(store, TARGET);
    await loader.prepare();
    const report = await loader.load(table, mapping);

    expect(report).toMatchObject({
      attempted: 3,
      inserted: 2,
      failed: 1,
      failures: [{ rowIndex: 1, message: 'value rejected by constraint' }],
      verifiedCount: 2,
    });
    expect(database.rows('survey', 'public_health_data').map((row) => row.gender)).toEqual([
      'Female',
      'Male',
    ]);
    expect(store.statements).toContain('ROLLBACK TO SAVEPOINT survey_load_row');
  });

  it('counts rows rejected before reaching the store', async () => {
    const database = new MemoryDatabase();
    const store = await database.connect();
    const { table, mapping } = exportWithGenders(['Female', 'x'.repeat(60)]);

    const loader = new RowLoader(store, TARGET);
    await loader.prepare();
    const report = await loader.load(table, mapping);

    expect(report.inserted).toBe(1);
    expect(report.failures).toEqual([
      { rowIndex: 1, message: 'gender is 60 characters, limit is VARCHAR(50)' },
    ]);
    expect(report.verifiedCount).toBe(1);
  });

  it('reports only the first failures but counts all of them', async () => {
    const database = new MemoryDatabase({
      rejectInsert: (row) => (row.gender === 'Bad' ? 'rejected' : null),
    });
    const store = await database.connect();
    const { table, mapping } = exportWithGenders(['Bad', 'Bad', 'Female', 'Bad', 'Bad', 'Bad']);
    const warn = vi.spyOn(logger, 'warn');

    const loader = new RowLoader(store, TARGET, { maxReportedErrors: 3 });
    await loader.prepare();
    const report = await loader.load(table, mapping);

    expect(report.failed).toBe(5);
    expect(report.failures.map((failure) => failure.rowIndex)).toEqual([0, 1, 3]);
    expect(warn).toHaveBeenCalledWith('Could not insert row 0: rejected');
    expect(warn).not.toHaveBeenCalledWith('Could not insert row 4: rejected');
    expect(warn).toHaveBeenCalledWith('5 records failed to insert');
  });

  it('logs progress every interval', async () => {
    const database = new MemoryDatabase();
    const store = await database.connect();
    const { table, mapping } = exportWithGenders(['a', 'b', 'c', 'd', 'e']);
    const info = vi.spyOn(logger, 'info');

    const loader = new RowLoader(store, TARGET, { progressInterval: 2 });
    await loader.prepare();
    await loader.load(table, mapping);

    const progress = info.mock.calls
      .map(([message]) => message)
      .filter((message) => message.startsWith('Inserted '));
    expect(progress).toEqual(['Inserted 2/5 records...', 'Inserted 4/5 records...']);
  });

  it('replaces rows left by a previous run', async () => {
    const database = new MemoryDatabase();

    const first = exportWithGenders(['a', 'b', 'c']);
    const firstLoader = new RowLoader(await database.connect(), TARGET);
    await firstLoader.prepare();
    await firstLoader.load(first.table, first.mapping);

    const second = exportWithGenders(['d']);
    const secondLoader = new RowLoader(await database.connect(), TARGET);
    await secondLoader.prepare();
    const report = await secondLoader.load(second.table, second.mapping);

    expect(report.verifiedCount).toBe(1);
    expect(database.rows('survey', 'public_health_data').map((row) => row.gender)).toEqual(['d']);
  });

  it('commits an empty table for an export without records', async () => {
    const database = new MemoryDatabase();
    const { table, mapping } = exportWithGenders([]);

    const loader = new RowLoader(await database.connect(), TARGET);
    await loader.prepare();
    const report = await loader.load(table, mapping);

    expect(report).toMatchObject({ attempted: 0, inserted: 0, verifiedCount: 0 });
    expect(database.hasTable('survey', 'public_health_data')).toBe(true);
  });

  it('aborts when the table cannot be prepared', async () => {
    const failing: SqlStore = {
      execute: async () => {
        throw new Error('permission denied for database');
      },
      commit: async () => undefined,
      rollback: async () => undefined,
      close: async () => undefined,
    };

    const loader = new RowLoader(failing, TARGET);

    await expect(loader.prepare()).rejects.toBeInstanceOf(TablePreparationError);
    expect(loader.phase).toBe('aborted-fatal');
  });

  it('refuses to load before the table is prepared', async () => {
    const database = new MemoryDatabase();
    const { table, mapping } = exportWithGenders(['a']);

    const loader = new RowLoader(await database.connect(), TARGET);

    await expect(loader.load(table, mapping)).rejects.toThrow(
      'Invalid load phase transition: idle → loading',
    );
  });

  it('rolls back everything when the connection is lost mid-batch', async () => {
    const database = new MemoryDatabase();
    const store = await database.connect();
    const { table, mapping } = exportWithGenders(['a', 'b', 'c']);

    const loader = new RowLoader(store, TARGET);
    await loader.prepare();

    const execute = store.execute.bind(store);
    let inserts = 0;
    vi.spyOn(store, 'execute').mockImplementation(
      async (sql: string, params?: readonly unknown[]): Promise<SqlResult> => {
        if (sql.startsWith('SAVEPOINT') && ++inserts === 2) {
          throw new Error('Connection terminated unexpectedly');
        }
        return execute(sql, params);
      },
    );

    const error = await loader.load(table, mapping).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LoadError);
    expect(error).toMatchObject({
      message: 'Load aborted after 2 of 3 rows: Connection terminated unexpectedly',
    });
    expect(loader.phase).toBe('aborted-fatal');
    expect(store.rollbacks).toBe(1);
    expect(database.rows('survey', 'public_health_data')).toEqual([]);
    expect(database.hasTable('survey', 'public_health_data')).toBe(true);
  });
});
