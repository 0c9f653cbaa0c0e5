/**
 * MCP server wiring: tool listing, dispatch and error responses.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { ConfigManager } from './config.js';
import { DexcomShareClient } from './dexcom-client.js';
import { callTool, tools, type ToolContext } from './tools.js';
import type { GlucoseSource } from './types.js';

export const SERVER_NAME = 'dexcom-glucose-mcp';
export const SERVER_VERSION = '1.0.0';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: true;
};

/**
 * Format error for MCP response
 */
export function handleError(error: unknown): ToolResponse {
  console.error('Dexcom MCP Error:', error);

  const message = error instanceof Error ? error.message : 'Unknown error occurred';

  return {
    content: [{
      type: 'text',
      text: `Error: ${message}`
    }],
    isError: true
  };
}

/**
 * Run one tool and wrap its payload (or failure) as an MCP text response.
 */
export async function respond(name: string, args: unknown, context: ToolContext): Promise<ToolResponse> {
  try {
    const payload = await callTool(name, args, context);
    return {
      content: [{
        type: 'text',
        text: JSON.stringify(payload, null, 2)
      }]
    };
  } catch (error) {
    return handleError(error);
  }
}

export function createServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return respond(name, args, context);
  });

  return server;
}

/**
 * Tool context backed by the environment configuration. The Dexcom client
 * is created on first use so tools given a batch never need credentials.
 */
export function createContext(configManager: ConfigManager = new ConfigManager()): ToolContext {
  let client: GlucoseSource | null = null;

  return {
    getSource: () => {
      if (!client) {
        client = new DexcomShareClient(configManager.getConfig());
      }
      return client;
    },
    now: () => new Date()
  };
}
