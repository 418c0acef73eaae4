/**
 * Everything a command needs about the workspace it runs against
 */

import * as path from 'path';
import type { AdminEnv } from './env';
import type { WorkspaceVars } from './workspace';
import type { ProcessRunner } from './runner';

export const DEFAULT_MODULE = 'mcp-docs';
export const ADMIN_WORKSPACE = 'admin';
export const SERVICE_PREFIX = 'docs-mcp';

export interface WorkspaceContext {
  workspace: string;
  terraformDir: string;
  /** Module the terraform commands run in */
  moduleDir: string;
  varFile: string;
  vars: WorkspaceVars;
  env: AdminEnv;
  /** Environment handed to every wrapped process */
  childEnv: NodeJS.ProcessEnv;
  yes: boolean;
}

export interface CommandIO {
  print(line: string): void;
  printError(line: string): void;
  confirm(message: string): Promise<boolean>;
}

export interface CommandDeps {
  runner: ProcessRunner;
  io: CommandIO;
}

/**
 * Environment for terraform/gcloud: the caller's, the `.env` values, and the
 * var-file flags terraform picks up for plan, apply and destroy
 */
export function buildChildEnv(
  base: NodeJS.ProcessEnv,
  env: AdminEnv,
  workspace: string,
  varFile: string
): NodeJS.ProcessEnv {
  const varFileArg = `-var-file=${varFile}`;
  return {
    ...base,
    ...env.values,
    WORKSPACE: workspace,
    TF_CLI_ARGS_plan: varFileArg,
    TF_CLI_ARGS_apply: varFileArg,
    TF_CLI_ARGS_destroy: varFileArg,
  };
}

export function serviceName(workspace: string): string {
  return `${SERVICE_PREFIX}-${workspace}`;
}

export function artifactRepoPath(region: string, project: string): string {
  return `${region}-docker.pkg.dev/${project}/${SERVICE_PREFIX}`;
}

export function resolveModuleDir(terraformDir: string, moduleName: string): string {
  return path.resolve(terraformDir, moduleName);
}
