// CRUD-операции для таблицы itinerary_items в пределах поездки.
import type postgres from 'postgres';
import type { ItineraryItemRow } from './schema.js';

export interface ItineraryItemData {
  day: number;
  title: string;
  description: string | null;
  startTime: Date | null;
  endTime: Date | null;
  destinationId: string | null;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface ItineraryStore {
  listByTrip(tripId: string, page: PageOptions): Promise<ItineraryItemRow[]>;
  countByTrip(tripId: string): Promise<number>;
  getById(tripId: string, id: string): Promise<ItineraryItemRow | null>;
  create(tripId: string, data: ItineraryItemData): Promise<ItineraryItemRow>;
  update(tripId: string, id: string, data: ItineraryItemData): Promise<ItineraryItemRow | null>;
  remove(tripId: string, id: string): Promise<boolean>;
}

// Хранилище пунктов маршрута.
export class ItineraryStorage implements ItineraryStore {
  constructor(private sql: postgres.Sql) {}

  // Порядок: день, время начала (пустое в конце), заголовок.
  async listByTrip(tripId: string, page: PageOptions): Promise<ItineraryItemRow[]> {
    return await this.sql<ItineraryItemRow[]>`
      SELECT * FROM itinerary_items
      WHERE trip_id = ${tripId}
      ORDER BY day ASC, start_time ASC NULLS LAST, title ASC
      LIMIT ${page.limit} OFFSET ${page.offset}
    `;
  }

  async countByTrip(tripId: string): Promise<number> {
    const rows = await this.sql<{ count: number }[]>`
      SELECT COUNT(*)::int AS count FROM itinerary_items WHERE trip_id = ${tripId}
    `;
    return rows[0]?.count ?? 0;
  }

  async getById(tripId: string, id: string): Promise<ItineraryItemRow | null> {
    const rows = await this.sql<ItineraryItemRow[]>`
      SELECT * FROM itinerary_items WHERE id = ${id} AND trip_id = ${tripId}
    `;
    return rows[0] ?? null;
  }

  async create(tripId: string, data: ItineraryItemData): Promise<ItineraryItemRow> {
    const rows = await this.sql<ItineraryItemRow[]>`
      INSERT INTO itinerary_items (trip_id, day, title, description, start_time, end_time, destination_id)
      VALUES (
        ${tripId},
        ${data.day},
        ${data.title},
        ${data.description},
        ${data.startTime},
        ${data.endTime},
        ${data.destinationId}
      )
      RETURNING *
    `;
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO itinerary_items returned no row');
    }
    return row;
  }

  async update(tripId: string, id: string, data: ItineraryItemData): Promise<ItineraryItemRow | null> {
    const rows = await this.sql<ItineraryItemRow[]>`
      UPDATE itinerary_items
      SET day = ${data.day},
          title = ${data.title},
          description = ${data.description},
          start_time = ${data.startTime},
          end_time = ${data.endTime},
          destination_id = ${data.destinationId}
      WHERE id = ${id} AND trip_id = ${tripId}
      RETURNING *
    `;
    return rows[0] ?? null;
  }

  async remove(tripId: string, id: string): Promise<boolean> {
    const result = await this.sql`
      DELETE FROM itinerary_items WHERE id = ${id} AND trip_id = ${tripId}
    `;
    return result.count > 0;
  }
}
