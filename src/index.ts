#!/usr/bin/env node

/**
 * Dexcom Glucose MCP Server
 *
 * Exposes Dexcom CGM readings and glucose analytics (statistics, episodes,
 * time-of-day blocks, AGP) as MCP tools over stdio.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigManager } from './config.js';
import { createContext, createServer, SERVER_NAME, SERVER_VERSION } from './server.js';

export { createContext, createServer, handleError } from './server.js';

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  const configManager = new ConfigManager();
  if (!configManager.isConfigured()) {
    console.error('Dexcom credentials not set; only tools given a data batch will work');
  }

  const server = createServer(createContext(configManager));
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`Dexcom MCP Server running on stdio (v${SERVER_VERSION}, region ${configManager.getRegion()})`);
}

// Run if executed directly
const entry = process.argv[1]?.replace(/\\/g, '/');
const isMainModule = entry !== undefined && (
  import.meta.url === `file:///${entry}` ||
  import.meta.url === `file://${entry}` ||
  entry.endsWith('/index.js') ||
  entry.endsWith(SERVER_NAME)
);

if (isMainModule) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
