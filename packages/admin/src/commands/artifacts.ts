/**
 * Artifact Registry listings
 */

import chalk from 'chalk';
import { GcloudService } from '../services/gcloud.service';
import { artifactRepoPath } from '../context';
import { requireVar } from '../workspace';
import type { AdminCommand } from './types';

export const artifactsAllReposListCommand: AdminCommand = {
  name: 'artifacts-all-repos-list',
  description: 'list all GCP Artifact Repositories',
  requiredVars: ['project_id'],
  run: (ctx, { runner, io }) => {
    const project = requireVar(ctx.vars, 'project_id', ctx.varFile);
    io.print(chalk.bold('Listing GCP Artifact Repositories ...'));
    return new GcloudService(runner, ctx.childEnv).listRepositories(project);
  },
};

export const artifactsMcpRepoListCommand: AdminCommand = {
  name: 'artifacts-mcp-repo-list',
  description: 'list the images in the GCP Artifact Repository for the mcp',
  requiredVars: ['project_id', 'region'],
  run: (ctx, { runner, io }) => {
    const repoPath = artifactRepoPath(
      requireVar(ctx.vars, 'region', ctx.varFile),
      requireVar(ctx.vars, 'project_id', ctx.varFile)
    );
    io.print(chalk.bold(`Listing mcp images in GCP Artifact Repository: ${repoPath}`));
    return new GcloudService(runner, ctx.childEnv).listImages(repoPath);
  },
};
