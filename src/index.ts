#!/usr/bin/env node
/**
 * Wikibase Curator MCP Server
 *
 * Entry point for the MCP server using stdio transport. Exposes the
 * curation tools (identifier resolution, claim building, entity upsert,
 * derived lookups, author merges) via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
dotenv.config();

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadCuratorConfig } from './server/config.js';
import { closeCuratorContext, createCuratorContext, type CuratorContext } from './server/context.js';
import { createCurationTools, type ToolDefinition } from './tools/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'wikibase-curator',
  version: '0.1.0',
});

function registerTools(tools: Record<string, ToolDefinition>): number {
  for (const [name, tool] of Object.entries(tools)) {
    server.tool(name, tool.description, tool.inputSchema, async (args) => tool.handler(args));
  }
  return Object.keys(tools).length;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  const config = loadCuratorConfig();
  const context: CuratorContext = await createCuratorContext(config);

  const shutdown = () => {
    closeCuratorContext(context);
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const count = registerTools(createCurationTools(context.curator));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Wikibase Curator MCP Server running on stdio (${config.wikibaseUrl})`);
  console.error(`Tools registered: ${count}`);
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
