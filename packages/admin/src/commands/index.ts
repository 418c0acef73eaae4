/**
 * Admin command registry
 *
 * Commands are grouped by the tool they drive:
 * - gcloud.ts     - gcloud setup
 * - terraform.ts  - terraform lifecycle
 * - others        - Cloud Run and Artifact Registry operations
 */

export * from './types';

import { gcloudInitCommand, gcloudAuthCommand, gcloudInitAuthCommand } from './gcloud';
import {
  initCommand,
  initUpgradeCommand,
  initWorkspaceCommand,
  applyCommand,
  destroyCommand,
  tfCmdCommand,
} from './terraform';
import { redeployImageCommand } from './redeploy-image';
import { nukeWorkspaceCommand } from './nuke-workspace';
import { artifactsAllReposListCommand, artifactsMcpRepoListCommand } from './artifacts';

import type { AdminCommand } from './types';

export const HELP_COMMAND = 'help';

// Order is the order shown in usage
export const allCommands: AdminCommand[] = [
  gcloudInitCommand,
  gcloudAuthCommand,
  gcloudInitAuthCommand,
  initCommand,
  initUpgradeCommand,
  initWorkspaceCommand,
  applyCommand,
  destroyCommand,
  redeployImageCommand,
  nukeWorkspaceCommand,
  tfCmdCommand,
  artifactsAllReposListCommand,
  artifactsMcpRepoListCommand,
];

export const commandMap = new Map<string, AdminCommand>(
  allCommands.map((command) => [command.name, command])
);

export function getCommand(name: string): AdminCommand | undefined {
  return commandMap.get(name);
}

/**
 * Usage text listing every command
 */
export function usage(): string {
  const lines = ['Usage: docs-mcp-admin <workspace> <command>', 'Commands:'];
  for (const command of allCommands) {
    lines.push(`    ${command.name}: ${command.description}`);
  }
  lines.push(`    ${HELP_COMMAND}: this message`);
  return lines.join('\n');
}
