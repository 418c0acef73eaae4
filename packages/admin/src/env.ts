/**
 * Project `.env` loading
 */

import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { AdminError } from '@docs-mcp/shared';

export const ENV_FILENAME = '.env';

export interface AdminEnv {
  envPath: string;
  inkeepApiKey: string;
  /** Every variable from the file, exported to wrapped processes */
  values: Record<string, string>;
}

export function loadAdminEnv(projectRoot: string): AdminEnv {
  const envPath = path.resolve(projectRoot, ENV_FILENAME);

  if (!existsSync(envPath)) {
    throw new AdminError(`.env file not found in project root (${envPath}).`);
  }

  const values = dotenv.parse(readFileSync(envPath, 'utf-8'));
  const inkeepApiKey = values.INKEEP_API_KEY;

  if (!inkeepApiKey) {
    throw new AdminError(`INKEEP_API_KEY is not set in .env file (${envPath}).`);
  }

  return { envPath, inkeepApiKey, values };
}
