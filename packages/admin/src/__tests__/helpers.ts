import { vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import type { ProcessRunner, RunOptions } from '../runner';
import type { AdminDeps } from '../program';

export interface RecordedRun {
  cmd: string;
  args: string[];
  options: RunOptions;
}

/**
 * Runner that records invocations. `exitCodes` maps a "cmd arg arg" prefix to
 * the code it returns; anything else exits 0.
 */
export function createFakeRunner(exitCodes: Record<string, number> = {}) {
  const runs: RecordedRun[] = [];
  const runner: ProcessRunner = {
    run: vi.fn(async (cmd: string, args: string[], options: RunOptions = {}) => {
      runs.push({ cmd, args, options });
      const line = [cmd, ...args].join(' ');
      const match = Object.keys(exitCodes)
        .filter((prefix) => line.startsWith(prefix))
        .sort((a, b) => b.length - a.length)[0];
      return match === undefined ? 0 : exitCodes[match];
    }),
  };
  return { runner, runs, lines: () => runs.map((r) => [r.cmd, ...r.args].join(' ')) };
}

export function createFakeIO(confirmAnswer = false) {
  const out: string[] = [];
  const err: string[] = [];
  const io = {
    print: vi.fn((line: string) => {
      out.push(line);
    }),
    printError: vi.fn((line: string) => {
      err.push(line);
    }),
    confirm: vi.fn(async () => confirmAnswer),
  };
  return { io, out, err };
}

export async function createTempDir(): Promise<string> {
  const tempDir = path.join(
    tmpdir(),
    `docs-mcp-admin-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const SAMPLE_TFVARS = `# dev workspace
project_id         = "test-project"
region             = "us-central1"
image              = "us-central1-docker.pkg.dev/test-project/docs-mcp/docs-mcp:latest"
min_instance_count = "0"
max_instance_count = "2"
container_memory   = "512Mi"
dns_managed_zone   = "test-zone"
`;

/**
 * Lay out a project root with `.env` and `admin/terraform/workspace-<ws>.tfvars`
 */
export async function writeProject(
  root: string,
  options: { env?: string | null; tfvars?: string | null; workspace?: string } = {}
): Promise<void> {
  const env = options.env === undefined ? 'INKEEP_API_KEY=test-secret\n' : options.env;
  const tfvars = options.tfvars === undefined ? SAMPLE_TFVARS : options.tfvars;
  const workspace = options.workspace ?? 'dev';

  if (env !== null) {
    await fs.writeFile(path.join(root, '.env'), env);
  }
  const terraformDir = path.join(root, 'admin', 'terraform');
  await fs.mkdir(path.join(terraformDir, 'mcp-docs'), { recursive: true });
  if (tfvars !== null) {
    await fs.writeFile(path.join(terraformDir, `workspace-${workspace}.tfvars`), tfvars);
  }
}

export function createDeps(
  cwd: string,
  runner: ProcessRunner,
  io: AdminDeps['io']
): AdminDeps {
  return { cwd, baseEnv: { PATH: '/usr/bin' }, runner, io };
}
