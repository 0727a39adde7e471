#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { BridgeDbServer } from './server.js';
import { IdentifierResolver } from './tools/resolver.js';

async function run() {
  const config = loadConfig();
  const { server } = new BridgeDbServer(new IdentifierResolver({ config }));

  process.on('SIGINT', async () => {
    await server.close();
    process.exit(0);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`BridgeDB MCP server running on stdio (${config.bridgedbBaseUrl})`);
}

run().catch((error: unknown) => {
  console.error('[MCP Error]', error);
  process.exit(1);
});
