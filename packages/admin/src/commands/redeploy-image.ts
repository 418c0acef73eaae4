/**
 * Redeploy the workspace image to its existing Cloud Run service
 */

import chalk from 'chalk';
import { GcloudService } from '../services/gcloud.service';
import { serviceName } from '../context';
import { requireVar } from '../workspace';
import type { AdminCommand } from './types';

export const redeployImageCommand: AdminCommand = {
  name: 'redeploy-image',
  description: 'redeploy the image to Cloud Run',
  requiredVars: ['project_id', 'region', 'image'],
  run: async (ctx, { runner, io }) => {
    const project = requireVar(ctx.vars, 'project_id', ctx.varFile);
    const region = requireVar(ctx.vars, 'region', ctx.varFile);
    const image = requireVar(ctx.vars, 'image', ctx.varFile);
    const service = serviceName(ctx.workspace);

    io.print(chalk.bold('Redeploying image to Cloud Run...'));
    io.print(`Project: ${project}`);
    io.print(`Region: ${region}`);
    io.print(`Image: ${image}`);

    const gcloud = new GcloudService(runner, ctx.childEnv);
    const exists = await gcloud.describeService(service, region, project);
    if (exists !== 0) {
      io.print(chalk.yellow(`Cloud Run service ${service} does not exist.`));
      return 0;
    }

    return gcloud.deployImage(service, image, region, project);
  },
};
