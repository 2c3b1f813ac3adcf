import { describe, it, expect } from 'vitest';
import { createFakePostgres } from './fake-postgres.js';
import { syncSchema } from '../sync.js';
import { runMigrations } from '../migrator.js';
import { allMigrations } from '../migrations/index.js';
import { TRAVEL_SCHEMA } from '../travel-schema.js';
import { SchemaSyncError } from '../errors.js';

describe('syncSchema', () => {
  it('фиксирует расширение отдельной транзакцией до таблиц и индексов', async () => {
    const db = createFakePostgres();

    await syncSchema(db.sql, TRAVEL_SCHEMA);

    expect(db.log.slice(0, 4)).toEqual([
      'BEGIN',
      'CREATE EXTENSION IF NOT EXISTS pg_trgm',
      'COMMIT',
      'BEGIN',
    ]);
    expect(db.log.at(-1)).toBe('COMMIT');
    expect(db.catalog().tables.size).toBe(5);
    expect(db.catalog().indexes.size).toBe(12);
  });

  it('повторная синхронизация ничего не меняет', async () => {
    const db = createFakePostgres();
    await syncSchema(db.sql, TRAVEL_SCHEMA);
    const before = db.catalog();

    await syncSchema(db.sql, TRAVEL_SCHEMA);

    expect(db.catalog()).toEqual(before);
  });

  it('создает те же объекты, что и миграции', async () => {
    const migrated = createFakePostgres();
    const synced = createFakePostgres();

    await runMigrations(migrated.sql, allMigrations);
    await syncSchema(synced.sql, TRAVEL_SCHEMA);

    const migratedTables = [...migrated.catalog().tables].filter((name) => name !== '_migrations').sort();
    expect([...synced.catalog().tables].sort()).toEqual(migratedTables);
    expect([...synced.catalog().indexes.keys()].sort()).toEqual([...migrated.catalog().indexes.keys()].sort());
    expect(synced.catalog().extensions).toEqual(migrated.catalog().extensions);
  });

  it('после синхронизации миграции применяются поверх существующих объектов', async () => {
    const db = createFakePostgres();
    await syncSchema(db.sql, TRAVEL_SCHEMA);
    const synced = db.catalog();

    const applied = await runMigrations(db.sql, allMigrations);

    expect(applied).toEqual(['001_initial', '002_pg_trgm', '003_destination_trigram_indexes']);
    expect([...db.catalog().tables].filter((name) => name !== '_migrations').sort()).toEqual([...synced.tables].sort());
    expect(db.catalog().indexes).toEqual(synced.indexes);
    expect(await runMigrations(db.sql, allMigrations)).toEqual([]);
  });

  it('синхронизация после миграций ничего не меняет', async () => {
    const db = createFakePostgres();
    await runMigrations(db.sql, allMigrations);
    const migrated = db.catalog();

    await syncSchema(db.sql, TRAVEL_SCHEMA);

    expect(db.catalog()).toEqual(migrated);
  });

  it('не создает таблицы, если расширение установить не удалось', async () => {
    const db = createFakePostgres({ available: [] });

    const sync = syncSchema(db.sql, TRAVEL_SCHEMA);

    await expect(sync).rejects.toBeInstanceOf(SchemaSyncError);
    await expect(sync).rejects.toMatchObject({
      code: '58P01',
      statement: 'CREATE EXTENSION IF NOT EXISTS pg_trgm',
    });
    expect(db.catalog().tables.size).toBe(0);
  });
});
