#!/usr/bin/env node
/**
 * meshgraph MCP Server
 *
 * Exposes node graph documents (edit, script, evaluate, save) as tools for
 * LLM agents. Runs over stdio; logs go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StructuredLogger, loadConfig } from '@meshgraph/graph-engine';
import { DocumentRegistry } from './registry.js';
import { registerTools } from './tools.js';

const config = loadConfig(process.env);
const logger = new StructuredLogger({ level: config.logLevel, sink: 'stderr' });

const server = new McpServer({
  name: 'meshgraph',
  version: '0.1.0',
});

registerTools(server, new DocumentRegistry({ config, logger }), {
  documentDir: process.env.MESHGRAPH_DOCUMENT_DIR,
});

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('meshgraph MCP server ready', { scriptTimeoutMs: config.scriptTimeoutMs, cacheMaxEntries: config.cacheMaxEntries });
