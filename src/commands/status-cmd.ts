// Команда travel status: состояние базы.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createDb, closeDb, collectStatus, STATUS_TABLES } from '../storage/index.js';

export const statusCommand = new Command('status')
  .description('Show database status')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const sql = createDb(config.database);

      try {
        const status = await collectStatus(sql);

        console.log('');
        console.log('=== Статус Travel Planner ===');
        console.log('');
        console.log(`База данных: ${config.database.host}:${config.database.port}/${config.database.name}`);
        console.log(`pg_trgm:     ${status.pgTrgmInstalled ? 'установлено' : 'не установлено'}`);
        console.log('');
        for (const table of STATUS_TABLES) {
          const count = status.counts[table];
          console.log(`${table.padEnd(16)} ${count === null ? 'нет таблицы' : count}`);
        }
        console.log('');
        console.log(`Миграции: ${status.migrations.length > 0 ? status.migrations.join(', ') : 'не применены'}`);
      } finally {
        await closeDb(sql);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
