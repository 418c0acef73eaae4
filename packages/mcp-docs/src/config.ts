/**
 * Docs server configuration
 * Reads from environment variables
 */

import { z } from 'zod';
import { ConfigError, parseLogLevel, type LogLevel } from '@docs-mcp/shared';

export const INKEEP_BASE_URL = 'https://api.inkeep.com/v1';
export const INKEEP_MODEL = 'inkeep-context-expert';

const envSchema = z.object({
  INKEEP_API_KEY: z
    .string({ required_error: 'INKEEP_API_KEY environment variable must be set' })
    .min(1, 'INKEEP_API_KEY environment variable must be set'),
  MCP_DOCS_HOST: z.string().min(1).default('127.0.0.1'),
  MCP_DOCS_PORT: z.string().optional(),
  PORT: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});

export interface ServerConfig {
  /** Inkeep API key used by docs_chat */
  inkeepApiKey: string;
  /** Interface the HTTP transports bind to */
  host: string;
  port: number;
  logLevel: LogLevel;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * Build the config from an environment. `MCP_DOCS_PORT` wins over `PORT`
 * (set by Cloud Run), which wins over 8001.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const values = parsed.data;
  return {
    inkeepApiKey: values.INKEEP_API_KEY,
    host: values.MCP_DOCS_HOST,
    port: parsePort(values.MCP_DOCS_PORT || values.PORT || '8001'),
    logLevel: parseLogLevel(values.LOG_LEVEL),
  };
}
