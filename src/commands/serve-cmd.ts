// Команда travel serve: запуск HTTP API.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createDb, closeDb } from '../storage/index.js';
import { startApiServer } from '../api/server.js';

export const serveCommand = new Command('serve')
  .description('Start the HTTP API')
  .option('-c, --config <path>', 'Path to config file')
  .option('-p, --port <port>', 'Port to listen on (overrides config)')
  .action(async (options: { config?: string; port?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const port = options.port === undefined ? config.server.port : Number(options.port);
      if (!Number.isInteger(port) || port <= 0) {
        throw new Error(`Некорректный порт: ${options.port ?? ''}`);
      }

      const sql = createDb(config.database);
      const server = startApiServer({ ...config.server, port }, sql);

      const shutdown = (): void => {
        server.close(() => {
          closeDb(sql).then(
            () => process.exit(0),
            (error: unknown) => {
              console.error('Ошибка закрытия подключения:', error);
              process.exit(1);
            },
          );
        });
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
