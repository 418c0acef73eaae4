/**
 * docs-mcp-server
 *
 * Serves the docs_chat tool over stdio, SSE or streamable HTTP.
 */

import 'dotenv/config';
import { Command, Option } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  configureLogger,
  createStreamSink,
  logError,
  logFullError,
  logInfo,
} from '@docs-mcp/shared';
import { loadConfig } from './config';
import { createServer, SERVER_VERSION } from './server';
import { createApp, listen, type HttpTransport } from './http';

type Transport = 'stdio' | HttpTransport;

function installProcessHandlers(): void {
  process.on('uncaughtException', (error) => {
    logFullError('uncaught exception', error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    logFullError('unhandled rejection', reason);
    process.exit(1);
  });
}

async function main(transport: Transport): Promise<void> {
  const config = loadConfig();
  // stdout carries the protocol under stdio
  const stream = transport === 'stdio' ? process.stderr : process.stdout;
  configureLogger([createStreamSink(stream, config.logLevel)]);
  installProcessHandlers();

  const context = { config };

  if (transport === 'stdio') {
    await createServer(context).connect(new StdioServerTransport());
    logInfo('Docs MCP server running on stdio');
    return;
  }

  const { app } = createApp(transport, context);
  await listen(app, config.host, config.port);
  logInfo(`Docs MCP server (${transport}) listening on http://${config.host}:${config.port}`);
}

const program = new Command();

program
  .name('docs-mcp-server')
  .description('MCP server answering Deephaven documentation questions')
  .version(SERVER_VERSION)
  .addOption(
    new Option('-t, --transport <transport>', 'transport to serve on')
      .choices(['stdio', 'sse', 'streamable-http'])
      .default('sse')
  )
  .action(async (options: { transport: Transport }) => {
    await main(options.transport);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logError('Failed to start docs MCP server', error);
  console.error('Failed to start docs MCP server:', error);
  process.exit(1);
});
