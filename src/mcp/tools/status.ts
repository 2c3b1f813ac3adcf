// MCP-инструмент status: состояние базы travel-planner.
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DatabaseStatus } from '../../storage/status.js';

// Регистрирует инструмент status на MCP-сервере.
export function registerStatusTool(server: McpServer, collect: () => Promise<DatabaseStatus>): void {
  server.registerTool(
    'status',
    {
      description: 'Get the database status: connectivity, applied migrations, ' +
        'whether the pg_trgm extension is installed, and row counts per table.',
      inputSchema: {},
    },
    async () => {
      try {
        const status = await collect();

        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              database: {
                connected: true,
                schemaVersion: status.migrations.at(-1) ?? null,
                migrations: status.migrations,
                pgTrgmInstalled: status.pgTrgmInstalled,
                counts: status.counts,
              },
            }, null, 2),
          }],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              database: { connected: false, error: message },
            }, null, 2),
          }],
          isError: true,
        };
      }
    },
  );
}
