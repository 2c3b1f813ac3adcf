// CRUD-операции для таблицы reminders в пределах поездки.
import type postgres from 'postgres';
import type { ReminderRow } from './schema.js';
import type { PageOptions } from './itinerary.js';

export interface ReminderData {
  message: string;
  remindAt: Date;
}

export interface ReminderStore {
  listByTrip(tripId: string, page: PageOptions): Promise<ReminderRow[]>;
  countByTrip(tripId: string): Promise<number>;
  getById(tripId: string, id: string): Promise<ReminderRow | null>;
  create(tripId: string, data: ReminderData): Promise<ReminderRow>;
  update(tripId: string, id: string, data: ReminderData): Promise<ReminderRow | null>;
  remove(tripId: string, id: string): Promise<boolean>;
}

// Хранилище напоминаний.
export class ReminderStorage implements ReminderStore {
  constructor(private sql: postgres.Sql) {}

  // Самые поздние напоминания первыми.
  async listByTrip(tripId: string, page: PageOptions): Promise<ReminderRow[]> {
    return await this.sql<ReminderRow[]>`
      SELECT * FROM reminders
      WHERE trip_id = ${tripId}
      ORDER BY remind_at DESC, id DESC
      LIMIT ${page.limit} OFFSET ${page.offset}
    `;
  }

  async countByTrip(tripId: string): Promise<number> {
    const rows = await this.sql<{ count: number }[]>`
      SELECT COUNT(*)::int AS count FROM reminders WHERE trip_id = ${tripId}
    `;
    return rows[0]?.count ?? 0;
  }

  async getById(tripId: string, id: string): Promise<ReminderRow | null> {
    const rows = await this.sql<ReminderRow[]>`
      SELECT * FROM reminders WHERE id = ${id} AND trip_id = ${tripId}
    `;
    return rows[0] ?? null;
  }

  async create(tripId: string, data: ReminderData): Promise<ReminderRow> {
    const rows = await this.sql<ReminderRow[]>`
      INSERT INTO reminders (trip_id, message, remind_at)
      VALUES (${tripId}, ${data.message}, ${data.remindAt})
      RETURNING *
    `;
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO reminders returned no row');
    }
    return row;
  }

  async update(tripId: string, id: string, data: ReminderData): Promise<ReminderRow | null> {
    const rows = await this.sql<ReminderRow[]>`
      UPDATE reminders
      SET message = ${data.message},
          remind_at = ${data.remindAt}
      WHERE id = ${id} AND trip_id = ${tripId}
      RETURNING *
    `;
    return rows[0] ?? null;
  }

  async remove(tripId: string, id: string): Promise<boolean> {
    const result = await this.sql`DELETE FROM reminders WHERE id = ${id} AND trip_id = ${tripId}`;
    return result.count > 0;
  }
}
