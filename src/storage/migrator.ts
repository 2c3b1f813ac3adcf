// Движок миграций для PostgreSQL.
import type postgres from 'postgres';
import { MigrationError, MigrationOrderError, MissingExtensionError } from './errors.js';

// Интерфейс миграции.
export interface Migration {
  name: string;
  // Расширения, которые миграция устанавливает.
  provides?: string[];
  // Расширения, которые должны быть установлены до начала миграции.
  requires?: string[];
  up(sql: postgres.Sql): Promise<void>;
}

// Создает таблицу _migrations, если она не существует.
async function ensureMigrationsTable(sql: postgres.Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;
}

// Возвращает список имен примененных миграций.
export async function getAppliedMigrations(sql: postgres.Sql): Promise<string[]> {
  await ensureMigrationsTable(sql);

  const rows = await sql<{ name: string }[]>`
    SELECT name FROM _migrations ORDER BY applied_at, name
  `;

  return rows.map((row) => row.name);
}

/**
 * Проверяет, что список миграций можно применить последовательно:
 * имена уникальны, и ни одна миграция не требует расширение,
 * которое устанавливает миграция, стоящая позже нее.
 */
export function checkMigrationOrder(migrations: Migration[]): void {
  const problems: string[] = [];
  const seen = new Set<string>();

  migrations.forEach((migration, position) => {
    if (seen.has(migration.name)) {
      problems.push(`duplicate migration name "${migration.name}"`);
    }
    seen.add(migration.name);

    for (const extension of migration.requires ?? []) {
      const providedLater = migrations
        .slice(position + 1)
        .find((later) => later.provides?.includes(extension));
      const providedEarlier = migrations
        .slice(0, position)
        .some((earlier) => earlier.provides?.includes(extension));

      if (providedLater && !providedEarlier) {
        problems.push(
          `"${migration.name}" requires ${extension}, which is created by the later migration "${providedLater.name}"`,
        );
      }
    }
  });

  if (problems.length > 0) {
    throw new MigrationOrderError(problems);
  }
}

// Возвращает расширения из списка, которых нет в pg_extension.
async function findMissingExtensions(sql: postgres.Sql, extensions: string[]): Promise<string[]> {
  if (extensions.length === 0) {
    return [];
  }

  const rows = await sql<{ extname: string }[]>`
    SELECT extname FROM pg_extension WHERE extname = ANY(${extensions})
  `;
  const installed = new Set(rows.map((row) => row.extname));
  return extensions.filter((name) => !installed.has(name));
}

/**
 * Применяет непримененные миграции последовательно и возвращает их имена.
 *
 * Каждая миграция выполняется в собственной транзакции вместе с записью в _migrations,
 * поэтому ее результат (в том числе CREATE EXTENSION) зафиксирован до старта следующей.
 * Ошибка откатывает только текущую миграцию и останавливает прогон.
 */
export async function runMigrations(
  sql: postgres.Sql,
  migrations: Migration[],
): Promise<string[]> {
  checkMigrationOrder(migrations);

  const applied = new Set(await getAppliedMigrations(sql));
  const appliedNow: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.name)) {
      continue;
    }

    // Type assertion нужен: TransactionSql работает как tagged template в runtime,
    // но TypeScript-типы пакета postgres не отражают это корректно.
    await sql.begin(async (tx: unknown) => {
      const query = tx as postgres.Sql;

      const missing = await findMissingExtensions(query, migration.requires ?? []);
      if (missing.length > 0) {
        throw new MissingExtensionError(migration.name, missing);
      }

      try {
        await migration.up(query);
      } catch (error) {
        throw new MigrationError(migration.name, error);
      }

      await query`
        INSERT INTO _migrations (name) VALUES (${migration.name})
      `;
    });

    appliedNow.push(migration.name);
  }

  return appliedNow;
}
