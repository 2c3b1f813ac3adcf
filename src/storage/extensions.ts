// Расширения PostgreSQL и классы операторов, которые они предоставляют.
import type postgres from 'postgres';

// Класс операторов -> расширение, без которого индекс с ним не создать.
export const OPERATOR_CLASS_EXTENSIONS: ReadonlyMap<string, string> = new Map([
  ['gin_trgm_ops', 'pg_trgm'],
  ['gist_trgm_ops', 'pg_trgm'],
]);

const SIMPLE_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

// Идентификатор в SQL: без кавычек, если он простой, иначе в двойных кавычках.
export function quoteIdent(name: string): string {
  if (SIMPLE_IDENTIFIER.test(name)) {
    return name;
  }
  return `"${name.replace(/"/g, '""')}"`;
}

export function extensionForOperatorClass(opclass: string): string | undefined {
  return OPERATOR_CLASS_EXTENSIONS.get(opclass);
}

// Идемпотентный оператор создания расширения.
export function createExtensionStatement(name: string): string {
  return `CREATE EXTENSION IF NOT EXISTS ${quoteIdent(name)}`;
}

// Создает расширение, если его еще нет. Повторный вызов ничего не меняет.
export async function ensureExtension(sql: postgres.Sql, name: string): Promise<void> {
  await sql.unsafe(createExtensionStatement(name));
}

// Возвращает имена установленных расширений.
export async function listInstalledExtensions(sql: postgres.Sql): Promise<string[]> {
  const rows = await sql<{ extname: string }[]>`
    SELECT extname FROM pg_extension ORDER BY extname
  `;
  return rows.map((row) => row.extname);
}

export async function isExtensionInstalled(sql: postgres.Sql, name: string): Promise<boolean> {
  const rows = await sql<{ extname: string }[]>`
    SELECT extname FROM pg_extension WHERE extname = ${name}
  `;
  return rows.length > 0;
}
