/**
 * @module config-loader
 * Configuration loader for specmock.
 *
 * Loads `specmock.yaml` configuration files, validates them with Zod,
 * supports `.env` file loading and `{{env.XXX}}` substitution.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { ConfigFileError } from './errors.js';

// =====================================================================
// Zod Schema
// =====================================================================

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Mock server configuration schema */
export const MockServerConfigSchema = z.object({
  spec: z.string().min(1).describe('Path to the OpenAPI contract (relative to the config file)'),
  port: z.coerce.number().int().min(0).max(65535).default(0).describe('Port to listen on; 0 picks a free one'),
  host: z.string().default('127.0.0.1').describe('Interface to bind'),
  logLevel: z.enum(LOG_LEVELS).default('info').describe('Fastify (pino) log level'),
  diagnostics: z.boolean().default(true).describe('Expose /_mock/health and /_mock/routes'),
}).describe('specmock configuration');

/** Validated configuration type inferred from the Zod schema */
export type MockServerConfig = z.infer<typeof MockServerConfigSchema>;

export const DEFAULT_CONFIG_FILES = ['specmock.yaml', 'specmock.yml'] as const;

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Load and validate a specmock configuration file.
 *
 * Steps:
 * 1. Load `.env` from the config file's directory
 * 2. Read and parse the YAML file
 * 3. Substitute `{{env.XXX}}` placeholders
 * 4. Validate with the Zod schema
 * 5. Resolve `spec` against the config file's directory
 *
 * @param configPath - Path to the configuration file.
 *   Defaults to `specmock.yaml` or `specmock.yml` in the current working directory.
 * @throws ConfigFileError if the file is missing, not valid YAML, or fails validation
 */
export async function loadConfig(configPath?: string): Promise<MockServerConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  const configDir = path.dirname(resolvedPath);

  dotenv.config({ path: path.resolve(configDir, '.env') });

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigFileError('CONFIG_NOT_FOUND', `Configuration file not found: ${resolvedPath}`, {
        configPath: resolvedPath,
      });
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new ConfigFileError(
      'CONFIG_INVALID',
      `YAML syntax error in ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}`,
      { configPath: resolvedPath },
    );
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigFileError(
      'CONFIG_INVALID',
      `Configuration file is empty or not a valid object: ${resolvedPath}`,
      { configPath: resolvedPath },
    );
  }

  const result = MockServerConfigSchema.safeParse(resolveEnvPlaceholders(parsed, process.env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigFileError(
      'CONFIG_INVALID',
      `Configuration validation failed:\n${issues.join('\n')}`,
      { configPath: resolvedPath, issues },
    );
  }

  return { ...result.data, spec: path.resolve(configDir, result.data.spec) };
}

/**
 * Replace `{{env.XXX}}` in every string of a parsed YAML value.
 * Unknown variables are left as-is.
 */
export function resolveEnvPlaceholders(
  value: unknown,
  env: Record<string, string | undefined>,
): unknown {
  if (typeof value === 'string') {
    return value.replace(/\{\{\s*env\.([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g, (match, key: string) => env[key] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, resolveEnvPlaceholders(v, env)]),
    );
  }
  return value;
}

/**
 * Path of the config file to use, or `undefined` when none was given and
 * none of the default names exist in `cwd`.
 */
export async function findConfigFile(cwd: string = process.cwd()): Promise<string | undefined> {
  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.resolve(cwd, name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // Try the next name
    }
  }
  return undefined;
}

// =====================================================================
// Internal Helpers
// =====================================================================

async function resolveConfigPath(configPath?: string): Promise<string> {
  if (configPath) {
    return path.resolve(configPath);
  }

  const found = await findConfigFile();
  if (found) return found;

  throw new ConfigFileError(
    'CONFIG_NOT_FOUND',
    `Configuration file not found. Looked for:\n${DEFAULT_CONFIG_FILES.map((name) => `  - ${path.resolve(name)}`).join('\n')}`,
  );
}
