import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ENTITY_KINDS, type EntityKind } from '../types.js';
import { AuthenticationError, FAILURE_POLICIES, type ExportSummary, type FieldSyncService } from '../sync/index.js';

export function registerExportTool(server: McpServer, service: FieldSyncService): void {
  server.registerTool(
    'export_records',
    {
      description:
        'Send pending taxpayer and/or parcel records to the backend in chunks. ' +
        'Accepted records are removed from the device with their photos; rejected chunks stay ' +
        'stored as failed and are retried by the next run. ' +
        'Only one export per record kind can run at a time, and none while reference data is syncing.',
      inputSchema: {
        kind: z
          .enum(['taxpayer', 'parcel', 'all'])
          .optional()
          .describe('Which records to export: taxpayer, parcel, or all (default)'),
        chunk_size: z.number().int().positive().optional().describe('Records per request'),
        max_chunks: z.number().int().positive().optional().describe('Stop after this many chunks'),
        failure_policy: z
          .enum(FAILURE_POLICIES)
          .optional()
          .describe('After a failed chunk: continue with the next one, or halt the session'),
      },
    },
    async ({ kind, chunk_size, max_chunks, failure_policy }) => {
      const kinds: EntityKind[] = !kind || kind === 'all' ? [...ENTITY_KINDS] : [kind];
      const summaries: ExportSummary[] = [];

      try {
        for (const k of kinds) {
          summaries.push(
            await service.exportRecords(k, {
              chunkSize: chunk_size,
              maxChunks: max_chunks,
              failurePolicy: failure_policy,
            }),
          );
        }

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(summaries, null, 2),
            },
          ],
        };
      } catch (error) {
        let text = `Error exporting records: ${error instanceof Error ? error.message : String(error)}`;
        if (error instanceof AuthenticationError && error.progress) {
          const { syncedCount, failedCount } = error.progress;
          text += ` (before aborting: ${syncedCount} synced, ${failedCount} failed)`;
        }
        if (summaries.length > 0) {
          text += `\nCompleted: ${JSON.stringify(summaries)}`;
        }
        return {
          content: [{ type: 'text' as const, text }],
          isError: true,
        };
      }
    },
  );
}
