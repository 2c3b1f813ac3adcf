// Декларативное описание схемы и генерация DDL из него.
import { createExtensionStatement, extensionForOperatorClass, quoteIdent } from './extensions.js';

export interface ForeignKey {
  table: string;
  column: string;
  onDelete?: 'CASCADE' | 'SET NULL' | 'RESTRICT';
}

export interface ColumnDefinition {
  name: string;
  // SQL-тип как есть: 'uuid', 'varchar(200)', 'timestamptz'.
  type: string;
  primaryKey?: boolean;
  nullable?: boolean;
  default?: string;
  references?: ForeignKey;
}

export interface TableDefinition {
  name: string;
  columns: ColumnDefinition[];
}

export interface IndexColumn {
  name: string;
  order?: 'ASC' | 'DESC';
  // Класс операторов, например gin_trgm_ops.
  opclass?: string;
}

export interface IndexDefinition {
  name: string;
  table: string;
  columns: IndexColumn[];
  using?: 'btree' | 'gin' | 'gist';
}

export interface SchemaDefinition {
  // Расширения, нужные схеме помимо выводимых из классов операторов.
  extensions?: string[];
  tables: TableDefinition[];
  indexes: IndexDefinition[];
}

export interface RenderOptions {
  ifNotExists?: boolean;
}

// План провижининга: расширения отдельно, они должны быть зафиксированы раньше остального.
export interface SchemaPlan {
  extensions: string[];
  extensionStatements: string[];
  statements: string[];
}

function renderColumn(column: ColumnDefinition): string {
  const parts = [quoteIdent(column.name), column.type];
  if (column.primaryKey) {
    parts.push('PRIMARY KEY');
  } else if (column.nullable === false) {
    parts.push('NOT NULL');
  }
  if (column.default !== undefined) {
    parts.push(`DEFAULT ${column.default}`);
  }
  if (column.references) {
    const ref = column.references;
    parts.push(`REFERENCES ${quoteIdent(ref.table)}(${quoteIdent(ref.column)})`);
    if (ref.onDelete) {
      parts.push(`ON DELETE ${ref.onDelete}`);
    }
  }
  return parts.join(' ');
}

export function renderCreateTable(table: TableDefinition, options: RenderOptions = {}): string {
  const head = options.ifNotExists ? 'CREATE TABLE IF NOT EXISTS' : 'CREATE TABLE';
  const columns = table.columns.map((column) => `  ${renderColumn(column)}`).join(',\n');
  return `${head} ${quoteIdent(table.name)} (\n${columns}\n)`;
}

function renderIndexColumn(column: IndexColumn): string {
  const parts = [quoteIdent(column.name)];
  if (column.opclass) {
    parts.push(column.opclass);
  }
  if (column.order) {
    parts.push(column.order);
  }
  return parts.join(' ');
}

export function renderCreateIndex(index: IndexDefinition, options: RenderOptions = {}): string {
  const head = options.ifNotExists ? 'CREATE INDEX IF NOT EXISTS' : 'CREATE INDEX';
  const using = index.using && index.using !== 'btree' ? ` USING ${index.using.toUpperCase()}` : '';
  const columns = index.columns.map(renderIndexColumn).join(', ');
  return `${head} ${quoteIdent(index.name)} ON ${quoteIdent(index.table)}${using} (${columns})`;
}

// Расширения, которых требуют индексы схемы (в порядке первого использования).
export function indexExtensions(index: IndexDefinition): string[] {
  const result: string[] = [];
  for (const column of index.columns) {
    const extension = column.opclass ? extensionForOperatorClass(column.opclass) : undefined;
    if (extension && !result.includes(extension)) {
      result.push(extension);
    }
  }
  return result;
}

// Все расширения схемы: явно перечисленные, затем выведенные из индексов.
export function requiredExtensions(schema: SchemaDefinition): string[] {
  const result: string[] = [];
  const add = (name: string): void => {
    if (!result.includes(name)) {
      result.push(name);
    }
  };

  for (const name of schema.extensions ?? []) {
    add(name);
  }
  for (const index of schema.indexes) {
    indexExtensions(index).forEach(add);
  }
  return result;
}

/**
 * Строит план провижининга схемы.
 * Таблицы идут раньше индексов; все операторы идемпотентны (IF NOT EXISTS).
 * Операторы расширений вынесены отдельно: их выполняют и фиксируют первыми.
 */
export function planSchema(schema: SchemaDefinition): SchemaPlan {
  const tableNames = new Set(schema.tables.map((table) => table.name));
  for (const index of schema.indexes) {
    if (!tableNames.has(index.table)) {
      throw new Error(`Index "${index.name}" refers to unknown table "${index.table}"`);
    }
  }

  const extensions = requiredExtensions(schema);
  return {
    extensions,
    extensionStatements: extensions.map(createExtensionStatement),
    statements: [
      ...schema.tables.map((table) => renderCreateTable(table, { ifNotExists: true })),
      ...schema.indexes.map((index) => renderCreateIndex(index, { ifNotExists: true })),
    ],
  };
}
