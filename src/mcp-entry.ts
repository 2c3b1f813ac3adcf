// Точка входа MCP-сервера travel-planner.
// MCP использует stdout для протокола: всё логирование через stderr.
import { loadConfig } from './config/index.js';
import { createDb, closeDb } from './storage/db.js';
import { startMcpServer } from './mcp/server.js';

// Парсинг аргумента --config из process.argv.
function parseConfigArg(): string | undefined {
  const idx = process.argv.indexOf('--config');
  return idx !== -1 ? process.argv[idx + 1] : undefined;
}

async function main(): Promise<void> {
  const config = await loadConfig(parseConfigArg());
  const sql = createDb(config.database);

  const shutdown = async (): Promise<void> => {
    await closeDb(sql);
    process.exit(0);
  };

  process.on('SIGINT', () => { void shutdown(); });
  process.on('SIGTERM', () => { void shutdown(); });

  await startMcpServer(sql);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`MCP server startup error: ${message}`);
  process.exit(1);
});
