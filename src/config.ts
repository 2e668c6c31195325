/**
 * Runtime configuration
 *
 * Loads the first .env file found, then reads and validates the
 * STATEMENT_STORE_* environment variables.
 *
 * Candidate .env locations (first found wins):
 * 1. STATEMENT_STORE_ENV_FILE (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development)
 *
 * @module config
 */

import dotenv from 'dotenv';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { configurationError } from './errors.js';

const DATABASE_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export const DEFAULT_DATABASE_NAME = 'statements';
export const DEFAULT_DOWNLOAD_BASE_PATH = '/api/exports';

/**
 * Nearest directory above this module that holds a package.json
 */
function findPackageRoot(): string | undefined {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Load the first existing .env candidate into process.env.
 * Variables already set in the environment are not overridden.
 *
 * @returns Path of the loaded file, or null when none exists
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): string | null {
  const packageRoot = findPackageRoot();
  const candidates = [
    env.STATEMENT_STORE_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    packageRoot !== undefined ? path.join(packageRoot, '.env') : undefined,
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      let parsed: Record<string, string>;
      try {
        parsed = dotenv.parse(fs.readFileSync(envPath));
      } catch (error) {
        throw configurationError(
          `Failed to load ${envPath}: ${error instanceof Error ? error.message : String(error)}`,
          { envPath }
        );
      }
      for (const [key, value] of Object.entries(parsed)) {
        if (env[key] === undefined) {
          env[key] = value;
        }
      }
      return envPath;
    }
  }
  return null;
}

const ConfigSchema = z.object({
  databasesPath: z.string().min(1, 'STATEMENT_STORE_DATABASES_PATH must not be empty'),
  defaultDatabase: z
    .string()
    .regex(
      DATABASE_NAME_PATTERN,
      'STATEMENT_STORE_DEFAULT_DATABASE may only contain letters, digits, underscores and hyphens'
    ),
  downloadBasePath: z
    .string()
    .min(1, 'STATEMENT_STORE_DOWNLOAD_BASE_PATH must not be empty')
    .transform((value) => value.replace(/\/+$/, '')),
});

export type AppConfig = z.output<typeof ConfigSchema>;

function expandHome(value: string): string {
  return value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value;
}

/**
 * Read configuration from the environment
 *
 * @throws AppError CONFIGURATION_ERROR when a variable is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse({
    databasesPath: expandHome(
      env.STATEMENT_STORE_DATABASES_PATH ?? path.join(os.homedir(), '.statement-store', 'databases')
    ),
    defaultDatabase: env.STATEMENT_STORE_DEFAULT_DATABASE ?? DEFAULT_DATABASE_NAME,
    downloadBasePath: env.STATEMENT_STORE_DOWNLOAD_BASE_PATH ?? DEFAULT_DOWNLOAD_BASE_PATH,
  });

  if (!result.success) {
    const issues = result.error.errors.map((e) => e.message);
    console.error(`[config] Invalid configuration: ${issues.join('; ')}`);
    throw configurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
