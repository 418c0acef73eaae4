/**
 * Delete the entire terraform workspace after confirmation
 */

import chalk from 'chalk';
import { TerraformService } from '../services/terraform.service';
import { ADMIN_WORKSPACE } from '../context';
import type { AdminCommand } from './types';

export const nukeWorkspaceCommand: AdminCommand = {
  name: 'nuke-workspace',
  description: 'delete the entire workspace (use with caution)',
  run: async (ctx, { runner, io }) => {
    if (!ctx.yes) {
      const confirmed = await io.confirm(
        `Are you sure you want to nuke the workspace (${ctx.workspace})!?!?`
      );
      if (!confirmed) {
        io.print(chalk.gray('ABORTING NUKE...'));
        return 0;
      }
    }

    io.print(chalk.red(`NUKING THE WORKSPACE (${ctx.workspace})...`));
    io.print(chalk.bold(`NUKE-WS: ${ctx.moduleDir}`));
    return new TerraformService(runner).nukeWorkspace(
      { moduleDir: ctx.moduleDir, env: ctx.childEnv },
      ctx.workspace,
      ADMIN_WORKSPACE
    );
  },
};
