// Декларативный провижининг схемы с гарантией порядка: расширения фиксируются раньше индексов.
import type postgres from 'postgres';
import { planSchema } from './ddl.js';
import type { SchemaDefinition, SchemaPlan } from './ddl.js';
import { SchemaSyncError } from './errors.js';

// Выполняет операторы в одной транзакции; ошибка откатывает всю транзакцию.
async function executeInTransaction(sql: postgres.Sql, statements: string[]): Promise<void> {
  if (statements.length === 0) {
    return;
  }

  // Type assertion нужен: TransactionSql работает как tagged template в runtime,
  // но TypeScript-типы пакета postgres не отражают это корректно.
  await sql.begin(async (tx: unknown) => {
    const query = tx as postgres.Sql;
    for (const statement of statements) {
      try {
        await query.unsafe(statement);
      } catch (error) {
        throw new SchemaSyncError(statement, error);
      }
    }
  });
}

/**
 * Создает недостающие объекты схемы.
 *
 * 1. CREATE EXTENSION IF NOT EXISTS для каждого нужного расширения: отдельная транзакция,
 *    которая фиксируется до начала следующего шага.
 * 2. Таблицы и индексы (IF NOT EXISTS): вторая транзакция.
 *
 * Повторный вызов ничего не меняет.
 */
export async function syncSchema(sql: postgres.Sql, schema: SchemaDefinition): Promise<SchemaPlan> {
  const plan = planSchema(schema);

  await executeInTransaction(sql, plan.extensionStatements);
  await executeInTransaction(sql, plan.statements);

  return plan;
}
