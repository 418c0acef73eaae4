/**
 * Terraform invocations. Each call resolves to the exit code of the first
 * step that failed, or 0.
 */

import type { ProcessRunner } from '../runner';
import { createScopedLogger } from '@docs-mcp/shared';

const log = createScopedLogger('terraform');

export interface TerraformTarget {
  moduleDir: string;
  env: NodeJS.ProcessEnv;
}

export class TerraformService {
  constructor(private readonly runner: ProcessRunner) {}

  private terraform(target: TerraformTarget, args: string[]): Promise<number> {
    return this.runner.run('terraform', args, { cwd: target.moduleDir, env: target.env });
  }

  init(target: TerraformTarget): Promise<number> {
    return this.terraform(target, ['init']);
  }

  initUpgrade(target: TerraformTarget): Promise<number> {
    return this.terraform(target, ['init', '-upgrade']);
  }

  initWorkspace(target: TerraformTarget, workspace: string): Promise<number> {
    return this.terraform(target, ['workspace', 'new', workspace]);
  }

  /**
   * Select the workspace, then run terraform with the API key passed as a variable
   */
  async run(
    target: TerraformTarget,
    workspace: string,
    args: string[],
    inkeepApiKey: string
  ): Promise<number> {
    const selected = await this.terraform(target, ['workspace', 'select', workspace]);
    if (selected !== 0) return selected;

    return this.terraform(target, [...args, '-var', `inkeep_api_key=${inkeepApiKey}`]);
  }

  /**
   * Delete a workspace from inside the admin workspace. A failed delete is
   * logged, not reported.
   */
  async nukeWorkspace(
    target: TerraformTarget,
    workspace: string,
    adminWorkspace: string
  ): Promise<number> {
    const selected = await this.terraform(target, ['workspace', 'select', adminWorkspace]);
    if (selected !== 0) {
      const created = await this.terraform(target, ['workspace', 'new', adminWorkspace]);
      if (created !== 0) return created;
    }

    const deleted = await this.terraform(target, ['workspace', 'delete', workspace]);
    if (deleted !== 0) {
      log.warn(`workspace delete exited with ${deleted}`, { workspace });
    }
    return 0;
  }
}
