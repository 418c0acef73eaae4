/**
 * Admin command types
 */

import type { CommandDeps, WorkspaceContext } from '../context';
import type { WorkspaceVarKey } from '../workspace';

export interface AdminCommand {
  name: string;
  description: string;
  /** Workspace variables checked before the command runs */
  requiredVars?: readonly WorkspaceVarKey[];
  /** Whether arguments after the command name are accepted */
  acceptsArgs?: boolean;
  run(ctx: WorkspaceContext, deps: CommandDeps, args: string[]): Promise<number>;
}
