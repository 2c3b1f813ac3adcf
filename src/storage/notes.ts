// CRUD-операции для таблицы notes в пределах поездки.
import type postgres from 'postgres';
import type { NoteRow } from './schema.js';
import type { PageOptions } from './itinerary.js';

export interface NoteStore {
  listByTrip(tripId: string, page: PageOptions): Promise<NoteRow[]>;
  countByTrip(tripId: string): Promise<number>;
  getById(tripId: string, id: string): Promise<NoteRow | null>;
  create(tripId: string, content: string): Promise<NoteRow>;
  update(tripId: string, id: string, content: string): Promise<NoteRow | null>;
  remove(tripId: string, id: string): Promise<boolean>;
}

// Хранилище заметок.
export class NoteStorage implements NoteStore {
  constructor(private sql: postgres.Sql) {}

  // Новые заметки первыми.
  async listByTrip(tripId: string, page: PageOptions): Promise<NoteRow[]> {
    return await this.sql<NoteRow[]>`
      SELECT * FROM notes
      WHERE trip_id = ${tripId}
      ORDER BY created_at DESC, id DESC
      LIMIT ${page.limit} OFFSET ${page.offset}
    `;
  }

  async countByTrip(tripId: string): Promise<number> {
    const rows = await this.sql<{ count: number }[]>`
      SELECT COUNT(*)::int AS count FROM notes WHERE trip_id = ${tripId}
    `;
    return rows[0]?.count ?? 0;
  }

  async getById(tripId: string, id: string): Promise<NoteRow | null> {
    const rows = await this.sql<NoteRow[]>`
      SELECT * FROM notes WHERE id = ${id} AND trip_id = ${tripId}
    `;
    return rows[0] ?? null;
  }

  async create(tripId: string, content: string): Promise<NoteRow> {
    const rows = await this.sql<NoteRow[]>`
      INSERT INTO notes (trip_id, content) VALUES (${tripId}, ${content})
      RETURNING *
    `;
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO notes returned no row');
    }
    return row;
  }

  async update(tripId: string, id: string, content: string): Promise<NoteRow | null> {
    const rows = await this.sql<NoteRow[]>`
      UPDATE notes SET content = ${content}
      WHERE id = ${id} AND trip_id = ${tripId}
      RETURNING *
    `;
    return rows[0] ?? null;
  }

  async remove(tripId: string, id: string): Promise<boolean> {
    const result = await this.sql`DELETE FROM notes WHERE id = ${id} AND trip_id = ${tripId}`;
    return result.count > 0;
  }
}
