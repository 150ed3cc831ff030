import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FieldSyncService } from '../sync/index.js';

export function registerSyncStatusTool(server: McpServer, service: FieldSyncService): void {
  server.registerTool(
    'sync_status',
    {
      description:
        'Show how many taxpayer and parcel records are pending, failed or synced, ' +
        'the size of each lookup table, and which sync operations are running.',
      inputSchema: {},
    },
    async () => {
      try {
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(service.status(), null, 2),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error reading sync status: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
