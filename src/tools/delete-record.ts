import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ENTITY_KINDS } from '../types.js';
import type { FieldSyncService } from '../sync/index.js';

export function registerDeleteRecordTool(server: McpServer, service: FieldSyncService): void {
  server.registerTool(
    'delete_record',
    {
      description:
        'Permanently delete a locally stored taxpayer or parcel, its buildings and owner, and its ' +
        'attachment files. This action is irreversible and the record will never be exported.',
      inputSchema: {
        kind: z.enum(ENTITY_KINDS).describe('Record kind'),
        id: z.number().int().positive().describe('Local id of the record'),
      },
    },
    async ({ kind, id }) => {
      try {
        const result = await service.deleteRecord(kind, id);
        if (!result) {
          return {
            content: [{ type: 'text' as const, text: `Record not found: ${kind} ${id}` }],
            isError: true,
          };
        }

        const text =
          `Deleted ${kind} ${id} (${result.filesDeleted} file(s) removed` +
          (result.filesFailed.length > 0 ? `, ${result.filesFailed.length} could not be removed)` : ')');
        return {
          content: [{ type: 'text' as const, text }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Failed to delete record: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
