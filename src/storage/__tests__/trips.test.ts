import { describe, it, expect } from 'vitest';
import { createRecordingSql } from './recording-sql.js';
import { TripStorage } from '../trips.js';
import type { SortDirection, TripSortField } from '../trips.js';

const TRIP_COLUMNS = 'id, name, start_date::text AS start_date, end_date::text AS end_date, created_at';

describe('TripStorage', () => {
  it.each<[TripSortField, SortDirection, string]>([
    ['created_at', 'desc', 'created_at DESC, id DESC'],
    ['created_at', 'asc', 'created_at ASC, id ASC'],
    ['name', 'desc', 'name DESC, id DESC'],
    ['name', 'asc', 'name ASC, id ASC'],
  ])('list сортирует по %s %s', async (sortBy, sortDir, orderBy) => {
    const db = createRecordingSql();
    const storage = new TripStorage(db.sql);

    await storage.list({ limit: 20, offset: 40, sortBy, sortDir });

    expect(db.queries).toEqual([{
      text: `SELECT ${TRIP_COLUMNS} FROM trips ORDER BY ${orderBy} LIMIT $1 OFFSET $2`,
      params: [20, 40],
    }]);
  });

  it('count читает COUNT(*)', async () => {
    const db = createRecordingSql(() => [{ count: 3 }]);
    const storage = new TripStorage(db.sql);

    expect(await storage.count()).toBe(3);
    expect(db.queries[0]?.text).toBe('SELECT COUNT(*)::int AS count FROM trips');
  });

  it('update перезаписывает поля и возвращает null для неизвестной поездки', async () => {
    const db = createRecordingSql();
    const storage = new TripStorage(db.sql);

    const updated = await storage.update('t-1', { name: 'Alps', startDate: '2025-07-01', endDate: null });

    expect(updated).toBeNull();
    expect(db.queries[0]).toEqual({
      text: 'UPDATE trips SET name = $1, start_date = $2, end_date = $3 ' +
        `WHERE id = $4 RETURNING ${TRIP_COLUMNS}`,
      params: ['Alps', '2025-07-01', null, 't-1'],
    });
  });

  it('remove сообщает, была ли удалена строка', async () => {
    const deleted = new TripStorage(createRecordingSql(() => [{}]).sql);
    const missing = new TripStorage(createRecordingSql().sql);

    expect(await deleted.remove('t-1')).toBe(true);
    expect(await missing.remove('t-2')).toBe(false);
  });
});
