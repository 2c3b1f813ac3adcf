// Команда travel schema: декларативная схема: печать плана и синхронизация.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createDb, closeDb, planSchema, syncSchema, TRAVEL_SCHEMA } from '../storage/index.js';

const printCommand = new Command('print')
  .description('Print the DDL plan (extensions first)')
  .action(() => {
    try {
      const plan = planSchema(TRAVEL_SCHEMA);

      console.log('-- Расширения (отдельная транзакция, фиксируется первой)');
      for (const statement of plan.extensionStatements) {
        console.log(`${statement};`);
      }
      console.log('');
      console.log('-- Таблицы и индексы');
      for (const statement of plan.statements) {
        console.log(`${statement};`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });

const syncCommand = new Command('sync')
  .description('Create missing extensions, tables and indexes')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const sql = createDb(config.database);

      try {
        console.log('Синхронизация схемы...');
        const plan = await syncSchema(sql, TRAVEL_SCHEMA);
        console.log(`Расширения: ${plan.extensions.length > 0 ? plan.extensions.join(', ') : 'нет'}`);
        console.log(`Выполнено операторов DDL: ${plan.extensionStatements.length + plan.statements.length}`);
      } finally {
        await closeDb(sql);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка синхронизации: ${message}`);
      process.exit(1);
    }
  });

export const schemaCommand = new Command('schema')
  .description('Declarative schema tools')
  .addCommand(printCommand)
  .addCommand(syncCommand);
