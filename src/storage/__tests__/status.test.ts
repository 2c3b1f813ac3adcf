import { describe, it, expect } from 'vitest';
import { createFakePostgres } from './fake-postgres.js';
import { collectStatus } from '../status.js';
import { runMigrations } from '../migrator.js';
import { allMigrations } from '../migrations/index.js';

describe('collectStatus', () => {
  it('на пустой базе сообщает об отсутствии миграций, pg_trgm и таблиц', async () => {
    const { sql } = createFakePostgres();

    const status = await collectStatus(sql);

    expect(status).toEqual({
      migrations: [],
      pgTrgmInstalled: false,
      counts: {
        trips: null,
        destinations: null,
        itinerary_items: null,
        notes: null,
        reminders: null,
      },
    });
  });

  it('после миграций видит pg_trgm и считает строки таблиц', async () => {
    const { sql } = createFakePostgres();
    await runMigrations(sql, allMigrations);

    const status = await collectStatus(sql);

    expect(status.migrations).toEqual(['001_initial', '002_pg_trgm', '003_destination_trigram_indexes']);
    expect(status.pgTrgmInstalled).toBe(true);
    expect(status.counts).toEqual({
      trips: 0,
      destinations: 0,
      itinerary_items: 0,
      notes: 0,
      reminders: 0,
    });
  });
});
