/**
 * docs-mcp-admin
 *
 * CLI entry point for deploying the docs MCP server with terraform and gcloud.
 */

import inquirer from 'inquirer';
import { configureLogger, createFileSink, getLogPath, logFullError } from '@docs-mcp/shared';
import { runAdmin, type AdminDeps } from './program';
import { spawnRunner } from './runner';

configureLogger([createFileSink(getLogPath(), 'docs-mcp-admin')]);

const deps: AdminDeps = {
  cwd: process.cwd(),
  baseEnv: process.env,
  runner: spawnRunner,
  io: {
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
    confirm: async (message) => {
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: 'confirm',
          name: 'confirm',
          message,
          default: false,
        },
      ]);
      return confirm;
    },
  },
};

runAdmin(process.argv.slice(2), deps)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logFullError('docs-mcp-admin', error);
    console.error(error);
    process.exitCode = 1;
  });
