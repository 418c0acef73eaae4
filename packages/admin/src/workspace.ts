/**
 * Per-workspace Terraform variable files (`workspace-<name>.tfvars`)
 */

import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AdminError, logWarn } from '@docs-mcp/shared';

export const WORKSPACE_VAR_KEYS = [
  'project_id',
  'region',
  'image',
  'min_instance_count',
  'max_instance_count',
  'container_memory',
  'dns_managed_zone',
] as const;

export type WorkspaceVarKey = (typeof WORKSPACE_VAR_KEYS)[number];

const countSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer');

export const workspaceVarsSchema = z
  .object({
    project_id: z.string().min(1),
    region: z.string().min(1),
    image: z.string().min(1),
    min_instance_count: countSchema,
    max_instance_count: countSchema,
    container_memory: z.string().min(1),
    // Empty skips the domain mapping
    dns_managed_zone: z.string(),
  })
  .partial();

export type WorkspaceVars = z.infer<typeof workspaceVarsSchema>;

export function workspaceVarFile(terraformDir: string, workspace: string): string {
  return path.resolve(terraformDir, `workspace-${workspace}.tfvars`);
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/**
 * Read top-level `key = value` assignments. The first assignment of a key wins.
 */
export function parseTfvars(content: string): Record<string, string> {
  const values: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith('//')) continue;

    const eq = line.indexOf('=');
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim();
    if (!/^[A-Za-z_][A-Za-z0-9_-]*$/.test(key)) continue;
    if (key in values) continue;

    values[key] = unquote(stripTrailingComment(line.slice(eq + 1)));
  }

  return values;
}

/**
 * Drop a `#` or `//` comment that is not inside a quoted string
 */
function stripTrailingComment(value: string): string {
  let inString = false;
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '"' && value[i - 1] !== '\\') {
      inString = !inString;
    } else if (!inString && (ch === '#' || (ch === '/' && value[i + 1] === '/'))) {
      return value.slice(0, i);
    }
  }
  return value;
}

/**
 * Load and validate a workspace file. A missing file yields no values.
 */
export function loadWorkspaceVars(varFile: string): WorkspaceVars {
  if (!existsSync(varFile)) {
    logWarn(`Workspace variable file not found: ${varFile}`);
    return {};
  }

  const parsed = workspaceVarsSchema.safeParse(parseTfvars(readFileSync(varFile, 'utf-8')));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new AdminError(`Invalid variables in ${varFile}: ${details}`);
  }

  return parsed.data;
}

/**
 * Fail with every missing key named at once
 */
export function requireVars(
  vars: WorkspaceVars,
  keys: readonly WorkspaceVarKey[],
  varFile: string
): void {
  const missing = keys.filter((key) => !vars[key]);
  if (missing.length > 0) {
    throw new AdminError(
      `Missing required variable(s) in ${varFile}: ${missing.join(', ')}`
    );
  }
}

export function requireVar(vars: WorkspaceVars, key: WorkspaceVarKey, varFile: string): string {
  const value = vars[key];
  if (!value) {
    throw new AdminError(`Missing required variable(s) in ${varFile}: ${key}`);
  }
  return value;
}
