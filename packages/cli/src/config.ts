/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export const CliConfigSchema = z.object({
  units: z.enum(['cm', 'px']).default('px'),
  outDir: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  environment: z.enum(['test', 'development', 'production']).default('production'),
  logFile: z.string().min(1).optional(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/** Environment variable for each config key */
const ENV_KEYS = {
  units: 'CTZ_UNITS',
  outDir: 'CTZ_OUT_DIR',
  logLevel: 'CTZ_LOG_LEVEL',
  environment: 'CTZ_ENV',
  logFile: 'CTZ_LOG_FILE',
} as const satisfies Record<keyof CliConfig, string>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');
    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load CLI configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * Empty values count as unset. Throws `ConfigError` naming every invalid key.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  const envFile = findEnvFile(cwd) ?? {};
  const raw: Record<string, string> = {};

  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable] || envFile[variable];
    if (value) {
      raw[key] = value;
    }
  }

  const parsed = CliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = issue.path.join('.');
      const variable = Object.entries(ENV_KEYS).find(([name]) => name === key)?.[1] ?? key;
      return `${variable}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  return parsed.data;
}
