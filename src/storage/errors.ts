// Ошибки провижининга схемы: миграции и декларативная синхронизация.

// SQLSTATE 42704 (undefined_object): в частности, неизвестный класс операторов.
export const UNDEFINED_OBJECT = '42704';

// SQLSTATE 23503 (foreign_key_violation).
export const FOREIGN_KEY_VIOLATION = '23503';

// Классы операторов pg_trgm. Их отсутствие означает, что расширение не установлено.
const TRIGRAM_OPERATOR_CLASS = /g(in|ist)_trgm_ops/;

// Возвращает SQLSTATE ошибки PostgreSQL, если он есть.
export function pgErrorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

// Подсказка для ошибки, вызванной отсутствующим pg_trgm.
export function missingExtensionHint(error: unknown): string | undefined {
  if (pgErrorCode(error) !== UNDEFINED_OBJECT || !(error instanceof Error)) {
    return undefined;
  }
  if (!TRIGRAM_OPERATOR_CLASS.test(error.message)) {
    return undefined;
  }
  return 'enable the pg_trgm extension first (CREATE EXTENSION IF NOT EXISTS pg_trgm)';
}

function describeCause(cause: unknown): string {
  const message = cause instanceof Error ? cause.message : String(cause);
  const hint = missingExtensionHint(cause);
  return hint ? `${message}; ${hint}` : message;
}

/**
 * Миграция не применилась. Изменения этой миграции откатаны,
 * ранее примененные миграции остаются зафиксированными.
 */
export class MigrationError extends Error {
  name = 'MigrationError';
  readonly code: string | undefined;

  constructor(readonly migration: string, cause: unknown) {
    super(`Migration "${migration}" failed: ${describeCause(cause)}`, { cause });
    this.code = pgErrorCode(cause);
  }
}

// Миграции требуют расширение, которое не установлено в базе.
export class MissingExtensionError extends Error {
  name = 'MissingExtensionError';

  constructor(readonly migration: string, readonly extensions: string[]) {
    super(
      `Migration "${migration}" requires extension(s) ${extensions.join(', ')}, ` +
      'which are not installed; a migration that creates them must run first',
    );
  }
}

// Список миграций упорядочен неверно: нельзя применить его последовательно.
export class MigrationOrderError extends Error {
  name = 'MigrationOrderError';

  constructor(readonly problems: string[]) {
    super(`Invalid migration order: ${problems.join('; ')}`);
  }
}

// Оператор декларативной синхронизации схемы завершился ошибкой.
export class SchemaSyncError extends Error {
  name = 'SchemaSyncError';
  readonly code: string | undefined;

  constructor(readonly statement: string, cause: unknown) {
    super(`Schema statement failed: ${describeCause(cause)}\n  ${statement}`, { cause });
    this.code = pgErrorCode(cause);
  }
}
