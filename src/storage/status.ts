// Сводка о состоянии базы: миграции, pg_trgm, число записей.
import type postgres from 'postgres';
import { isExtensionInstalled, quoteIdent } from './extensions.js';
import { getAppliedMigrations } from './migrator.js';

export const STATUS_TABLES = ['trips', 'destinations', 'itinerary_items', 'notes', 'reminders'] as const;

export type StatusTable = (typeof STATUS_TABLES)[number];

export interface DatabaseStatus {
  migrations: string[];
  pgTrgmInstalled: boolean;
  // null: таблица еще не создана.
  counts: Record<StatusTable, number | null>;
}

async function countRows(sql: postgres.Sql, table: StatusTable): Promise<number | null> {
  const [exists] = await sql<{ relation: string | null }[]>`
    SELECT to_regclass(${table})::text AS relation
  `;
  if (!exists?.relation) {
    return null;
  }

  const [row] = await sql.unsafe<{ count: number }[]>(
    `SELECT COUNT(*)::int AS count FROM ${quoteIdent(table)}`,
  );
  return row?.count ?? 0;
}

export async function collectStatus(sql: postgres.Sql): Promise<DatabaseStatus> {
  const [migrations, pgTrgmInstalled, ...counts] = await Promise.all([
    getAppliedMigrations(sql),
    isExtensionInstalled(sql, 'pg_trgm'),
    ...STATUS_TABLES.map((table) => countRows(sql, table)),
  ]);

  return {
    migrations,
    pgTrgmInstalled,
    counts: {
      trips: counts[0] ?? null,
      destinations: counts[1] ?? null,
      itinerary_items: counts[2] ?? null,
      notes: counts[3] ?? null,
      reminders: counts[4] ?? null,
    },
  };
}
