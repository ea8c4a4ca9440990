#!/usr/bin/env node
/**
 * partcheck MCP Server
 *
 * Exposes DFM analysis, cost comparison, process-switch simulation and
 * automated fixes as callable tools. Runs over stdio; logs go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger, loadConfig, setLogLevel } from '@partcheck/dfm-engine';
import { createContext } from './context.js';
import { registerTools } from './tools.js';

const config = loadConfig();
setLogLevel(config.logLevel);
const log = createLogger('server');

const server = new McpServer({
  name: 'partcheck',
  version: '0.1.0',
});

registerTools(server, createContext(config));

const transport = new StdioServerTransport();
await server.connect(transport);
log.info('Listening on stdio', { host: config.host.kind });
