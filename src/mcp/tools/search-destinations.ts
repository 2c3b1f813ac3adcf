// MCP-инструмент search_destinations: поиск направлений по подстроке.
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DestinationSearchService } from '../../search/destination-search.js';

// Регистрирует инструмент search_destinations на MCP-сервере.
export function registerSearchDestinationsTool(server: McpServer, search: DestinationSearchService): void {
  server.registerTool(
    'search_destinations',
    {
      description: 'Case-insensitive partial text search over travel destinations. ' +
        'Matches the name and optionally the country and city; ordered by popularity, then name.',
      inputSchema: {
        query: z.string().describe('Search text (partial match)'),
        limit: z.number().int().min(1).max(100).optional().describe('Page size (default: 20)'),
        offset: z.number().int().min(0).optional().describe('Number of results to skip'),
        includeCountry: z.boolean().optional().describe('Match on country (default: true)'),
        includeCity: z.boolean().optional().describe('Match on city (default: true)'),
      },
    },
    async (args) => {
      try {
        const response = await search.search({
          q: args.query,
          limit: args.limit,
          offset: args.offset,
          includeCountry: args.includeCountry,
          includeCity: args.includeCity,
        });

        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify(response, null, 2),
          }],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{ type: 'text' as const, text: `Search error: ${message}` }],
          isError: true,
        };
      }
    },
  );
}
