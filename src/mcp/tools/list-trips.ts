// MCP-инструмент list_trips: страница поездок.
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { TripListOptions, TripStore } from '../../storage/trips.js';

export function registerListTripsTool(server: McpServer, trips: TripStore): void {
  server.registerTool(
    'list_trips',
    {
      description: 'List planned trips with pagination. Newest first unless another order is requested.',
      inputSchema: {
        limit: z.number().int().min(1).max(100).optional().describe('Maximum number of trips (default: 20)'),
        offset: z.number().int().min(0).optional().describe('Number of trips to skip'),
        sortBy: z.enum(['created_at', 'name']).optional().describe('Sort field (default: created_at)'),
        sortDir: z.enum(['asc', 'desc']).optional().describe('Sort direction (default: desc)'),
      },
    },
    async (args) => {
      try {
        const options: TripListOptions = {
          limit: args.limit ?? 20,
          offset: args.offset ?? 0,
          sortBy: args.sortBy ?? 'created_at',
          sortDir: args.sortDir ?? 'desc',
        };
        const [total, rows] = await Promise.all([trips.count(), trips.list(options)]);

        const result = {
          total,
          items: rows.map((trip) => ({
            id: trip.id,
            name: trip.name,
            startDate: trip.start_date,
            endDate: trip.end_date,
            createdAt: trip.created_at.toISOString(),
          })),
        };

        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          }],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{ type: 'text' as const, text: `Error listing trips: ${message}` }],
          isError: true,
        };
      }
    },
  );
}
