/**
 * Logger shared by the admin CLI and the docs server.
 *
 * Entries go to every configured sink. The CLI writes a rotating debug log
 * file; the server writes to a stream (stderr under stdio so the protocol
 * channel stays clean).
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'CMD' | 'STDOUT' | 'STDERR';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  CMD: 20,
  STDOUT: 20,
  STDERR: 20,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export const DOCS_MCP_DIR = '.docs-mcp';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

export interface LogSink {
  write(level: LogLevel, entry: string): void;
}

let sinks: LogSink[] = [];
let logFilePath: string | null = null;

/**
 * Parse a level name from the environment, defaulting to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = (value || '').trim().toUpperCase();
  if (upper === 'WARNING') return 'WARN';
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  return 'INFO';
}

/**
 * Get the debug log file path
 */
export function getLogPath(cwd: string = process.cwd()): string {
  if (!logFilePath) {
    // Try local .docs-mcp first, fall back to home directory
    const localDir = path.join(cwd, DOCS_MCP_DIR);
    const homeDir = path.join(homedir(), DOCS_MCP_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      if (!fs.existsSync(homeDir)) {
        fs.mkdirSync(homeDir, { recursive: true });
      }
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

/**
 * Sink appending to a debug log file, rotated once it passes 5MB
 */
export function createFileSink(logPath: string, sessionName: string): LogSink {
  let sessionStarted = false;

  const startSession = (): void => {
    if (sessionStarted) return;
    sessionStarted = true;

    try {
      if (fs.existsSync(logPath)) {
        const stats = fs.statSync(logPath);
        if (stats.size > MAX_LOG_SIZE) {
          const backupPath = logPath + '.old';
          if (fs.existsSync(backupPath)) {
            fs.unlinkSync(backupPath);
          }
          fs.renameSync(logPath, backupPath);
        }
      }
    } catch {
      // Rotation is best effort
    }

    const timestamp = new Date().toISOString();
    const separator = '='.repeat(80);
    const header = `\n${separator}\n[${timestamp}] ${sessionName} Session Started\n${separator}\n`;

    try {
      fs.appendFileSync(logPath, header);
    } catch {
      // The debug log never interrupts the CLI
    }
  };

  return {
    write(_level, entry) {
      startSession();
      try {
        fs.appendFileSync(logPath, entry);
      } catch {
        // The debug log never interrupts the CLI
      }
    },
  };
}

/**
 * Sink writing to a stream, dropping entries below the threshold
 */
export function createStreamSink(
  stream: NodeJS.WritableStream,
  threshold: LogLevel = 'INFO'
): LogSink {
  return {
    write(level, entry) {
      if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
      stream.write(entry);
    },
  };
}

/**
 * Replace the active sinks
 */
export function configureLogger(next: LogSink[]): void {
  sinks = next;
}

/**
 * Format a log entry
 */
export function formatEntry(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level}] ${message}`;

  if (data !== undefined) {
    try {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object') {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } else {
        entry += `\n  Data: ${String(data)}`;
      }
    } catch {
      entry += `\n  Data: [Could not serialize]`;
    }
  }

  return entry + '\n';
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  if (sinks.length === 0) return;
  const entry = formatEntry(level, message, data);
  for (const sink of sinks) {
    sink.write(level, entry);
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

/**
 * Log a debug message (verbose)
 */
export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log an external command about to run
 */
export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Log command output (stdout/stderr)
 */
export function logOutput(type: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(type === 'stdout' ? 'STDOUT' : 'STDERR', output.trim());
  }
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface ScopedLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  command(cmd: string, args?: Record<string, unknown>): void;
}

/**
 * Create a logger whose messages carry a `[scope]` prefix
 */
export function createScopedLogger(scope: string): ScopedLogger {
  return {
    info: (message, data) => logInfo(`[${scope}] ${message}`, data),
    warn: (message, data) => logWarn(`[${scope}] ${message}`, data),
    error: (message, data) => logError(`[${scope}] ${message}`, data),
    debug: (message, data) => logDebug(`[${scope}] ${message}`, data),
    command: (cmd, args) => logCommand(`[${scope}] ${cmd}`, args),
  };
}
