import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ENTITY_KINDS, type SyncableRecord } from '../types.js';
import type { FieldSyncService } from '../sync/index.js';

function describeRecord(record: SyncableRecord): Record<string, unknown> {
  const result: Record<string, unknown> = {
    id: record.id,
    created_at: record.created_at,
    sync_status: record.ledger.status,
  };
  switch (record.ledger.status) {
    case 'pending':
      result.sync_attempts = record.ledger.attempts;
      break;
    case 'failed':
      result.sync_error = record.ledger.error;
      result.sync_attempts = record.ledger.attempts;
      result.last_sync_at = record.ledger.lastSyncAt;
      break;
    case 'synced':
      result.last_sync_at = record.ledger.lastSyncAt;
      break;
  }
  return result;
}

export function registerListRecordsTool(server: McpServer, service: FieldSyncService): void {
  server.registerTool(
    'list_records',
    {
      description:
        'List locally stored taxpayer or parcel records with their sync state, oldest first. ' +
        'Use status "failed" to see which records the backend rejected and the error it gave; ' +
        'those records are retried by the next export_records run.',
      inputSchema: {
        kind: z.enum(ENTITY_KINDS).describe('Record kind'),
        status: z
          .enum(['pending', 'failed', 'synced', 'all'])
          .optional()
          .describe('Filter by sync state (default: all)'),
        limit: z.number().int().min(1).max(100).optional().describe('Max results (default: 20, max: 100)'),
        offset: z.number().int().min(0).optional().describe('Offset for pagination (default: 0)'),
      },
    },
    async ({ kind, status, limit, offset }) => {
      try {
        const effectiveLimit = limit ?? 20;
        const effectiveOffset = offset ?? 0;
        const statusFilter = status === 'all' ? undefined : status;

        const counts = service.status()[kind];
        const total = statusFilter ? counts[statusFilter] : counts.pending + counts.failed + counts.synced;
        const records = service.listRecords(kind, {
          status: statusFilter,
          limit: effectiveLimit,
          offset: effectiveOffset,
        });

        if (records.length === 0) {
          return {
            content: [{ type: 'text' as const, text: `No ${kind} records found matching the specified filters.` }],
          };
        }

        const results = records.map(describeRecord);
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({
                count: results.length,
                total,
                offset: effectiveOffset,
                has_more: effectiveOffset + results.length < total,
                filter: { kind, status: status ?? 'all' },
                results,
              }),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error listing records: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
