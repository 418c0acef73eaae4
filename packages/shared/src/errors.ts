/**
 * Error types shared across packages
 */

export class DocsMcpError extends Error {
  readonly code: string;

  constructor(message: string, code = 'DOCS_MCP_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Failure in the admin CLI that ends the process with `exitCode`
 */
export class AdminError extends DocsMcpError {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message, 'ADMIN_ERROR');
    this.exitCode = exitCode;
  }
}

/**
 * Invalid or missing configuration value
 */
export class ConfigError extends DocsMcpError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
