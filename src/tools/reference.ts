import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FieldSyncService } from '../sync/index.js';

export function registerSyncReferenceTool(server: McpServer, service: FieldSyncService): void {
  server.registerTool(
    'sync_reference_data',
    {
      description:
        'Replace the local lookup tables (activity types, zone types, communes, quartiers, avenues) ' +
        'with the backend\'s current lists. Ids are kept as the backend assigns them, so stored ' +
        'records keep pointing at the same entries. The tables are left untouched if anything fails. ' +
        'Cannot run while an export is in progress.',
      inputSchema: {},
    },
    async () => {
      try {
        const result = await service.synchronizeReferenceData();
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(result, null, 2),
            },
          ],
          ...(!result.success && { isError: true }),
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error syncing reference data: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
