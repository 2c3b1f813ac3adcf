// Команда travel migrate: применение миграций.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createDb, closeDb, runMigrations, allMigrations } from '../storage/index.js';

export const migrateCommand = new Command('migrate')
  .description('Apply pending database migrations')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const sql = createDb(config.database);

      try {
        console.log('Применение миграций...');
        const applied = await runMigrations(sql, allMigrations);

        if (applied.length === 0) {
          console.log('Новых миграций нет, схема актуальна.');
          return;
        }
        for (const name of applied) {
          console.log(`  + ${name}`);
        }
        console.log(`Применено миграций: ${applied.length}`);
      } finally {
        await closeDb(sql);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка миграции: ${message}`);
      process.exit(1);
    }
  });
