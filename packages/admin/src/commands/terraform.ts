/**
 * Terraform lifecycle commands for the docs server module
 */

import chalk from 'chalk';
import { TerraformService, type TerraformTarget } from '../services/terraform.service';
import { resolveModuleDir, type WorkspaceContext } from '../context';
import type { AdminCommand } from './types';

const AUTO_APPROVE = ['-auto-approve'];

function moduleTarget(ctx: WorkspaceContext, moduleDir = ctx.moduleDir): TerraformTarget {
  return { moduleDir, env: ctx.childEnv };
}

export const initCommand: AdminCommand = {
  name: 'init',
  description: 'initialize terraform',
  run: (ctx, { runner, io }) => {
    io.print(chalk.bold(`INIT: ${ctx.moduleDir}`));
    return new TerraformService(runner).init(moduleTarget(ctx));
  },
};

export const initUpgradeCommand: AdminCommand = {
  name: 'init-upgrade',
  description: 'upgrade and initialize terraform',
  run: (ctx, { runner, io }) => {
    io.print(chalk.bold(`INIT: ${ctx.moduleDir}`));
    return new TerraformService(runner).initUpgrade(moduleTarget(ctx));
  },
};

export const initWorkspaceCommand: AdminCommand = {
  name: 'init-ws',
  description: 'initialize terraform workspace',
  run: (ctx, { runner, io }) => {
    io.print(chalk.bold(`INIT: ${ctx.moduleDir}`));
    return new TerraformService(runner).initWorkspace(moduleTarget(ctx), ctx.workspace);
  },
};

function lifecycleCommand(name: 'apply' | 'destroy', description: string): AdminCommand {
  return {
    name,
    description,
    run: (ctx, { runner, io }) => {
      const args = [name, ...AUTO_APPROVE];
      io.print(chalk.bold(`APPLY: ${ctx.moduleDir} ${args.join(' ')}`));
      return new TerraformService(runner).run(
        moduleTarget(ctx),
        ctx.workspace,
        args,
        ctx.env.inkeepApiKey
      );
    },
  };
}

export const applyCommand = lifecycleCommand(
  'apply',
  'apply all sub-modules to bring up the entire system'
);

export const destroyCommand = lifecycleCommand(
  'destroy',
  'destroy all sub-modules to bring down the entire system'
);

export const tfCmdCommand: AdminCommand = {
  name: 'tf-cmd',
  description: 'run a terraform command with the given arguments (use with caution)',
  acceptsArgs: true,
  run: (ctx, { runner, io }, args) => {
    const [moduleName, ...terraformArgs] = args;
    if (!moduleName || terraformArgs.length === 0) {
      io.printError(chalk.red('tf-cmd requires a module directory and terraform arguments'));
      io.printError(chalk.gray('  e.g. tf-cmd mcp-docs plan'));
      return Promise.resolve(1);
    }

    const moduleDir = resolveModuleDir(ctx.terraformDir, moduleName);
    io.print(chalk.bold(`APPLY: ${moduleDir} ${terraformArgs.join(' ')}`));
    return new TerraformService(runner).run(
      moduleTarget(ctx, moduleDir),
      ctx.workspace,
      terraformArgs,
      ctx.env.inkeepApiKey
    );
  },
};
