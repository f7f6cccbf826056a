/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import { LOG_LEVELS, type Environment, type LogLevel } from '@schematic/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export interface SchematicConfig {
  environment: Environment;
  /** Overrides the environment's minimum log level */
  logLevel?: LogLevel;
  /** Base directory holding NN/input files, used when solving every day */
  inputDir?: string;
}

const CONFIG_KEYS = ['SCHEMATIC_ENV', 'SCHEMATIC_LOG_LEVEL', 'SCHEMATIC_INPUT_DIR'] as const;

const configSchema = z.object({
  SCHEMATIC_ENV: z.enum(['test', 'development', 'production']).default('production'),
  SCHEMATIC_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  SCHEMATIC_INPUT_DIR: z.string().min(1).optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** KEY=value; blank lines, lines without '=' and # comments do not match */
const ENV_LINE = /^\s*([^#=\s][^=]*?)\s*=\s*(.*?)\s*$/;
const QUOTED = /^(["'])(.*)\1$/;

/**
 * Parse a .env file into a key-value object. Matching quotes around a value
 * are removed.
 */
export function parseEnvFile(content: string): Record<string, string> {
  return Object.fromEntries(
    content.split('\n').flatMap((line): [string, string][] => {
      const match = ENV_LINE.exec(line);
      if (!match) return [];
      const [, key, value] = match;
      return [[key, QUOTED.exec(value)?.[2] ?? value]];
    }),
  );
}

/**
 * Find the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): { dir: string; values: Record<string, string> } | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      return { dir: currentDir, values: parseEnvFile(fs.readFileSync(envPath, 'utf-8')) };
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
 * Load configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * A relative SCHEMATIC_INPUT_DIR is resolved against the directory that
 * defined it.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): SchematicConfig {
  const envFile = findEnvFile(cwd);
  const raw: Record<string, string> = {};
  let inputDirBase = cwd;

  for (const key of CONFIG_KEYS) {
    const fromProcess = env[key];
    const fromFile = envFile?.values[key];
    if (fromProcess !== undefined && fromProcess !== '') {
      raw[key] = fromProcess;
    } else if (fromFile !== undefined && fromFile !== '') {
      raw[key] = fromFile;
      if (key === 'SCHEMATIC_INPUT_DIR' && envFile) {
        inputDirBase = envFile.dir;
      }
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const { SCHEMATIC_ENV, SCHEMATIC_LOG_LEVEL, SCHEMATIC_INPUT_DIR } = parsed.data;

  return {
    environment: SCHEMATIC_ENV,
    ...(SCHEMATIC_LOG_LEVEL ? { logLevel: SCHEMATIC_LOG_LEVEL } : {}),
    ...(SCHEMATIC_INPUT_DIR
      ? { inputDir: path.resolve(inputDirBase, SCHEMATIC_INPUT_DIR) }
      : {}),
  };
}
