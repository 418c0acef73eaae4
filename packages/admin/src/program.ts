/**
 * Argument handling and dispatch for docs-mcp-admin
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { AdminError, createScopedLogger, errorMessage, logFullError } from '@docs-mcp/shared';
import { loadAdminEnv } from './env';
import { loadWorkspaceVars, requireVars, workspaceVarFile } from './workspace';
import {
  buildChildEnv,
  resolveModuleDir,
  DEFAULT_MODULE,
  type CommandDeps,
  type WorkspaceContext,
} from './context';
import { getCommand, usage, HELP_COMMAND } from './commands';
import { redactArgs } from './runner';

const log = createScopedLogger('admin');

export const VERSION = '0.1.0';

export interface ProgramOptions {
  projectRoot?: string;
  terraformDir?: string;
  yes?: boolean;
}

export interface AdminDeps extends CommandDeps {
  cwd: string;
  baseEnv: NodeJS.ProcessEnv;
}

/**
 * Resolve the workspace and run one command, returning the exit code
 */
export async function dispatch(
  workspace: string | undefined,
  commandName: string | undefined,
  args: string[],
  options: ProgramOptions,
  deps: AdminDeps
): Promise<number> {
  const { io } = deps;

  if (commandName === HELP_COMMAND || (workspace === HELP_COMMAND && !commandName)) {
    io.print(usage());
    return 0;
  }

  if (!workspace || !commandName) {
    io.printError(usage());
    return 1;
  }

  const command = getCommand(commandName);
  if (!command) {
    io.printError(chalk.red(`Unknown command: ${commandName}`));
    io.printError(usage());
    return 1;
  }

  if (args.length > 0 && !command.acceptsArgs) {
    io.printError(usage());
    return 1;
  }

  try {
    const projectRoot = path.resolve(deps.cwd, options.projectRoot ?? '.');
    const terraformDir = options.terraformDir
      ? path.resolve(deps.cwd, options.terraformDir)
      : path.join(projectRoot, 'admin', 'terraform');

    const env = loadAdminEnv(projectRoot);
    const varFile = workspaceVarFile(terraformDir, workspace);
    io.print(chalk.gray(`CONFIGURATION: ${varFile}`));

    const vars = loadWorkspaceVars(varFile);
    io.print(chalk.gray(`PROJECT: ${vars.project_id ?? ''}`));
    io.print(chalk.gray(`REGION: ${vars.region ?? ''}`));
    io.print(chalk.gray(`IMAGE: ${vars.image ?? ''}`));

    if (command.requiredVars) {
      requireVars(vars, command.requiredVars, varFile);
    }

    const ctx: WorkspaceContext = {
      workspace,
      terraformDir,
      moduleDir: resolveModuleDir(terraformDir, DEFAULT_MODULE),
      varFile,
      vars,
      env,
      childEnv: buildChildEnv(deps.baseEnv, env, workspace, varFile),
      yes: options.yes ?? false,
    };

    log.info(`Running ${command.name}`, { workspace, args: redactArgs(args) });
    const code = await command.run(ctx, deps, args);
    if (code !== 0) {
      log.error(`${command.name} exited with ${code}`, { workspace });
    }
    return code;
  } catch (error) {
    if (error instanceof AdminError) {
      io.printError(chalk.red(`ERROR: ${error.message}`));
      log.error(error.message);
      return error.exitCode;
    }
    logFullError(commandName, error, { workspace, args: redactArgs(args) });
    io.printError(chalk.red(`ERROR: ${errorMessage(error)}`));
    return 1;
  }
}

/**
 * Build the commander program. The resolved exit code is passed to `onExit`.
 */
export function createProgram(deps: AdminDeps, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('docs-mcp-admin')
    .description('Deploy and manage the docs MCP server on Google Cloud')
    .version(VERSION)
    .argument('[workspace]', 'terraform workspace (e.g. dev, prod)')
    .argument('[command]', 'command to run (see `help`)')
    .argument('[args...]', 'arguments for tf-cmd')
    .option('-y, --yes', 'Skip confirmation prompts')
    .option('--project-root <dir>', 'Directory holding the .env file', '.')
    .option('--terraform-dir <dir>', 'Directory holding modules and workspace .tfvars files')
    .allowUnknownOption()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.io.print(str.trimEnd()),
      writeErr: (str) => deps.io.printError(str.trimEnd()),
    })
    .action(
      async (
        workspace: string | undefined,
        commandName: string | undefined,
        args: string[] | undefined,
        options: ProgramOptions
      ) => {
        onExit(await dispatch(workspace, commandName, args ?? [], options, deps));
      }
    );

  return program;
}

/**
 * Parse user arguments (without the node and script entries) and run
 */
export async function runAdmin(argv: string[], deps: AdminDeps): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
