// MCP stdio-сервер travel-planner: search_destinations, list_trips, status.
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type postgres from 'postgres';
import type { DestinationStore } from '../storage/destinations.js';
import type { TripStore } from '../storage/trips.js';
import type { DatabaseStatus } from '../storage/status.js';
import { DestinationStorage, TripStorage, collectStatus } from '../storage/index.js';
import { DestinationSearchService } from '../search/destination-search.js';
import { registerSearchDestinationsTool } from './tools/search-destinations.js';
import { registerListTripsTool } from './tools/list-trips.js';
import { registerStatusTool } from './tools/status.js';

export interface McpDependencies {
  destinations: DestinationStore;
  trips: TripStore;
  status(): Promise<DatabaseStatus>;
}

// Создает MCP-сервер со всеми инструментами, без транспорта.
export function createMcpServer(deps: McpDependencies): McpServer {
  const server = new McpServer({
    name: 'travel-planner',
    version: '0.1.0',
  });

  registerSearchDestinationsTool(server, new DestinationSearchService(deps.destinations));
  registerListTripsTool(server, deps.trips);
  registerStatusTool(server, deps.status);

  return server;
}

// Запускает MCP stdio-сервер поверх PostgreSQL.
export async function startMcpServer(sql: postgres.Sql): Promise<void> {
  const server = createMcpServer({
    destinations: new DestinationStorage(sql),
    trips: new TripStorage(sql),
    status: () => collectStatus(sql),
  });

  // Подключаем stdio transport.
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('travel-planner MCP server started');
}
