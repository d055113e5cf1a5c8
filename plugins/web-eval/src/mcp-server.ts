#!/usr/bin/env node

/**
 * MCP server exposing the web_eval_agent tool.
 *
 * Speaks MCP over stdio, so nothing in this process may write to stdout:
 * diagnostics go to stderr and run progress goes to the dashboard.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { join } from 'path';
import dotenv from 'dotenv';
import { loadConfig, PLUGIN_ROOT } from './config.js';
import { getLogServer } from './log-server.js';
import {
  runWebEval,
  safeTool,
  webEvalInputSchema,
  WEB_EVAL_TOOL_DESCRIPTION,
  WEB_EVAL_TOOL_NAME,
} from './tool.js';

dotenv.config({ path: join(PLUGIN_ROOT, '.env') });

const server = new McpServer({ name: 'web-eval-agent', version: '0.1.0' });

server.registerTool(
  WEB_EVAL_TOOL_NAME,
  {
    description: WEB_EVAL_TOOL_DESCRIPTION,
    inputSchema: webEvalInputSchema,
  },
  async (args) => safeTool(() => runWebEval(args, loadConfig())),
);

// ---------- Start ----------

async function main() {
  // fail fast on a malformed environment rather than on the first tool call
  const config = loadConfig();
  if (!config.apiKey) {
    console.error('[web-eval] OPERATIVE_API_KEY is not set; tool calls will fail until it is.');
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[web-eval] MCP server running on stdio');
}

async function shutdown() {
  try {
    await getLogServer().stop();
    await server.close();
  } catch (err) {
    console.error('[web-eval] Error during shutdown:', err);
  } finally {
    process.exit(0);
  }
}

main().catch((err) => {
  console.error('MCP server failed to start:', err);
  process.exit(1);
});

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());
