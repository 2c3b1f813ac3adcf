// CRUD-операции для таблицы trips.
import type postgres from 'postgres';
import type { TripRow } from './schema.js';

export type TripSortField = 'created_at' | 'name';
export type SortDirection = 'asc' | 'desc';

export interface TripListOptions {
  limit: number;
  offset: number;
  sortBy: TripSortField;
  sortDir: SortDirection;
}

// Полный набор изменяемых полей поездки.
export interface TripData {
  name: string;
  startDate: string | null;
  endDate: string | null;
}

export interface TripStore {
  list(options: TripListOptions): Promise<TripRow[]>;
  count(): Promise<number>;
  getById(id: string): Promise<TripRow | null>;
  create(data: TripData): Promise<TripRow>;
  update(id: string, data: TripData): Promise<TripRow | null>;
  remove(id: string): Promise<boolean>;
}

// DATE отдаем строкой, чтобы не получить сдвиг часового пояса при разборе в Date.
const TRIP_COLUMNS = 'id, name, start_date::text AS start_date, end_date::text AS end_date, created_at';

const ORDER_BY: Record<TripSortField, Record<SortDirection, string>> = {
  created_at: { asc: 'created_at ASC, id ASC', desc: 'created_at DESC, id DESC' },
  name: { asc: 'name ASC, id ASC', desc: 'name DESC, id DESC' },
};

// Хранилище поездок.
export class TripStorage implements TripStore {
  constructor(private sql: postgres.Sql) {}

  async list(options: TripListOptions): Promise<TripRow[]> {
    return await this.sql<TripRow[]>`
      SELECT ${this.sql.unsafe(TRIP_COLUMNS)}
      FROM trips
      ORDER BY ${this.sql.unsafe(ORDER_BY[options.sortBy][options.sortDir])}
      LIMIT ${options.limit} OFFSET ${options.offset}
    `;
  }

  async count(): Promise<number> {
    const rows = await this.sql<{ count: number }[]>`
      SELECT COUNT(*)::int AS count FROM trips
    `;
    return rows[0]?.count ?? 0;
  }

  async getById(id: string): Promise<TripRow | null> {
    const rows = await this.sql<TripRow[]>`
      SELECT ${this.sql.unsafe(TRIP_COLUMNS)} FROM trips WHERE id = ${id}
    `;
    return rows[0] ?? null;
  }

  async create(data: TripData): Promise<TripRow> {
    const rows = await this.sql<TripRow[]>`
      INSERT INTO trips (name, start_date, end_date)
      VALUES (${data.name}, ${data.startDate}, ${data.endDate})
      RETURNING ${this.sql.unsafe(TRIP_COLUMNS)}
    `;
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO trips returned no row');
    }
    return row;
  }

  async update(id: string, data: TripData): Promise<TripRow | null> {
    const rows = await this.sql<TripRow[]>`
      UPDATE trips
      SET name = ${data.name},
          start_date = ${data.startDate},
          end_date = ${data.endDate}
      WHERE id = ${id}
      RETURNING ${this.sql.unsafe(TRIP_COLUMNS)}
    `;
    return rows[0] ?? null;
  }

  // Удаляет поездку. Маршрут, заметки и напоминания удаляются каскадно.
  async remove(id: string): Promise<boolean> {
    const result = await this.sql`DELETE FROM trips WHERE id = ${id}`;
    return result.count > 0;
  }
}
