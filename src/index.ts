#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { openDb, closeDb, DEFAULT_DB_PATH } from './db/connection.js';
import { createServer, SERVER_NAME } from './server.js';
import {
  FieldSyncService,
  credentialsFromEnv,
  loadConfigFile,
  parseCliArgs,
  resolveSettings,
  type SettingsOverrides,
} from './sync/index.js';

const HELP = `
${SERVER_NAME}: offline field census sync engine (MCP Server)

Usage:
  ${SERVER_NAME} [options]

Options:
  --db-path <path>            Path to SQLite database (default: ${DEFAULT_DB_PATH})
  --config <path>             JSON config file (baseUrl, chunkSize, failurePolicy,
                              requestTimeoutMs, credentials)
  --base-url <url>            Backend API base URL
  --chunk-size <n>            Records per export request (default: 20)
  --failure-policy <policy>   continue (default) or halt after a failed chunk
  --timeout <seconds>         Per-request I/O timeout (default: 60)
  --help                      Show this help message

Environment:
  FIELDSYNC_EMAIL, FIELDSYNC_PASSWORD   Backend login credentials
`;

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.error(HELP);
    process.exit(0);
  }

  const layers: SettingsOverrides[] = [];
  if (cli.configPath) {
    layers.push(loadConfigFile(cli.configPath));
  }
  const envCredentials = credentialsFromEnv(process.env);
  if (envCredentials) {
    layers.push({ credentials: envCredentials });
  }
  layers.push(cli.overrides);
  const settings = resolveSettings(...layers);

  const db = openDb(cli.dbPath);
  console.error('Database initialized');

  if (!settings.credentials) {
    console.error('Warning: no backend credentials configured; exports will fail to authenticate');
  }

  const service = new FieldSyncService({ db, settings });
  const server = createServer(service);
  console.error(`Backend: ${settings.baseUrl} (chunk size ${settings.chunkSize}, ${settings.failurePolicy} on failure)`);

  // Clean shutdown
  const shutdown = async () => {
    await server.close();
    closeDb(db);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('Shutdown error:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // Connect stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`${SERVER_NAME} server running on stdio`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
