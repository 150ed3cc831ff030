import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { INSTRUCTIONS } from './instructions.js';
import type { FieldSyncService } from './sync/index.js';
import { registerSubmitTaxpayerTool } from './tools/submit-taxpayer.js';
import { registerSubmitParcelTool } from './tools/submit-parcel.js';
import { registerDeleteRecordTool } from './tools/delete-record.js';
import { registerExportTool } from './tools/export.js';
import { registerSyncReferenceTool } from './tools/reference.js';
import { registerSyncStatusTool } from './tools/status.js';
import { registerListRecordsTool } from './tools/list-records.js';

export const SERVER_NAME = 'fieldsync-mcp';
export const SERVER_VERSION = '1.0.0';

/** Build the MCP server with every tool bound to `service`. */
export function createServer(service: FieldSyncService): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: INSTRUCTIONS },
  );

  registerSubmitTaxpayerTool(server, service);
  registerSubmitParcelTool(server, service);
  registerDeleteRecordTool(server, service);
  registerExportTool(server, service);
  registerSyncReferenceTool(server, service);
  registerSyncStatusTool(server, service);
  registerListRecordsTool(server, service);

  return server;
}
