/**
 * Child process execution for the wrapped terraform and gcloud binaries
 */

import { spawn } from 'child_process';
import { logCommand, logOutput } from '@docs-mcp/shared';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Capture output into the debug log instead of the terminal */
  quiet?: boolean;
}

export interface ProcessRunner {
  /** Resolves to the exit code; a process that cannot start resolves to 127 */
  run(cmd: string, args: string[], options?: RunOptions): Promise<number>;
}

const SECRET_ARG = /^([A-Za-z0-9_]*(?:api_key|token|secret|password)[A-Za-z0-9_]*=).+$/i;

/**
 * Mask the values of secret-looking `name=value` arguments
 */
export function redactArgs(args: string[]): string[] {
  return args.map((arg) => arg.replace(SECRET_ARG, '$1***'));
}

/**
 * Runner backed by `child_process.spawn`
 */
export const spawnRunner: ProcessRunner = {
  run(cmd, args, options = {}) {
    logCommand(`${cmd} ${redactArgs(args).join(' ')}`, { cwd: options.cwd ?? process.cwd() });

    return new Promise((resolve) => {
      const proc = spawn(cmd, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: options.quiet ? ['ignore', 'pipe', 'pipe'] : 'inherit',
      });

      let stdout = '';
      let stderr = '';
      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        logOutput('stderr', `${cmd}: ${err.message}`);
        resolve(127);
      });

      proc.on('close', (code, signal) => {
        logOutput('stdout', stdout);
        logOutput('stderr', stderr);
        if (signal) {
          resolve(128);
          return;
        }
        resolve(code ?? 1);
      });
    });
  },
};
