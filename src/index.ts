#!/usr/bin/env node

import dotenv from 'dotenv';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { getAuditStats } from './core/audit-logger.js';
import { REQUIRED_ENV_VARS } from './core/config.js';
import { createRuntime } from './core/runtime.js';
import {
  EXECUTE_GRAPHQL_TOOL,
  ExecuteGraphqlSchema,
  handleExecuteGraphql,
} from './tools/graphql/execute-graphql.js';

const SERVER_NAME = 'intuit-graphql-mcp';
const SERVER_VERSION = '0.1.0';

/**
 * Main entry point for the Intuit GraphQL MCP Server.
 */
async function main(): Promise<void> {
  // Log to stderr (stdout is reserved for MCP protocol)
  console.error(`[${SERVER_NAME}] Starting v${SERVER_VERSION}...`);

  // Values already in the environment take precedence over .env
  dotenv.config();

  const { context } = createRuntime(process.env, { logPrefix: `[${SERVER_NAME}]` });
  if (context.kind === 'misconfigured') {
    console.error(
      `[${SERVER_NAME}] Tool calls will fail until ${REQUIRED_ENV_VARS.join(', ')} are set.`
    );
  }

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.tool(
    EXECUTE_GRAPHQL_TOOL.name,
    EXECUTE_GRAPHQL_TOOL.description,
    ExecuteGraphqlSchema.shape,
    async (args) => {
      const parsed = ExecuteGraphqlSchema.parse(args);
      const result = await handleExecuteGraphql(parsed, context);
      return {
        content: [{ type: 'text' as const, text: result.output }],
        isError: !result.success,
      };
    }
  );

  const transport = new StdioServerTransport();

  console.error(`[${SERVER_NAME}] Connecting to transport...`);

  await server.connect(transport);

  console.error(`[${SERVER_NAME}] Ready. Registered 1 tool:`);
  console.error(`  - ${EXECUTE_GRAPHQL_TOOL.name}`);

  const shutdown = (signal: string): void => {
    const stats = getAuditStats();
    console.error(
      `[${SERVER_NAME}] Received ${signal}, shutting down. ` +
        `Calls: ${stats.total_entries} (${stats.successful} ok, ${stats.failed} failed), ` +
        `avg ${stats.avg_execution_time_ms} ms, paths: ${JSON.stringify(stats.by_path)}`
    );
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error(`[${SERVER_NAME}] Fatal error:`, error);
  process.exit(1);
});
