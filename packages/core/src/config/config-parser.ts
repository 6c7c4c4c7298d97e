import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import type { BlogboardConfig } from '../types/config.js';
import { safeRecord } from '../utils/safe-cast.js';

export const CONFIG_FILE_NAME = '.blogboard.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Zod Schemas ---

const serverConfigSchema = z.object({
  port: z.number().int('Port must be an integer').min(1, 'Port must be between 1 and 65535').max(65535, 'Port must be between 1 and 65535'),
  corsOrigin: z.string().min(1, 'corsOrigin must not be empty'),
});

const authConfigSchema = z.object({
  jwtSecret: z.string().min(1, 'jwtSecret must not be empty'),
  tokenTtl: z.string().regex(/^\d+[smhd]$/, 'tokenTtl must look like 30s, 15m, 12h or 7d'),
});

const postsConfigSchema = z.object({
  seed: z.boolean(),
  perPage: z.number().int('perPage must be an integer').positive('perPage must be positive'),
});

const blogboardConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  server: serverConfigSchema,
  auth: authConfigSchema,
  posts: postsConfigSchema,
});

// --- Defaults ---

export const DEFAULT_JWT_SECRET = 'dev-secret';

export const DEFAULT_CONFIG: BlogboardConfig = {
  version: '1',
  server: {
    port: 5002,
    corsOrigin: '*',
  },
  auth: {
    jwtSecret: DEFAULT_JWT_SECRET,
    tokenTtl: '15m',
  },
  posts: {
    seed: true,
    perPage: 10,
  },
};

// --- Environment variable interpolation ---

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const ESCAPED_ENV_VAR_PATTERN = /\\\$\{([^}]+)\}/g;

function interpolateEnvVarsInString(value: string, env: NodeJS.ProcessEnv): string | ConfigError {
  // First, temporarily replace escaped \${...} with a placeholder
  const placeholder = '\x00ENV_ESCAPED\x00';
  const withPlaceholders = value.replace(ESCAPED_ENV_VAR_PATTERN, `${placeholder}$1${placeholder}`);

  const missing: string[] = [];
  const resolved = withPlaceholders.replace(ENV_VAR_PATTERN, (match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      missing.push(varName);
      return match;
    }
    return envValue;
  });

  if (missing.length > 0) {
    return new ConfigError(
      `Missing environment variable(s): ${missing.join(', ')}. Set them before starting Blogboard.`,
    );
  }

  // Restore escaped sequences as literal ${...}
  return resolved.replace(
    new RegExp(`${placeholder.replace(/\x00/g, '\\x00')}(.+?)${placeholder.replace(/\x00/g, '\\x00')}`, 'g'),
    (_match, varName: string) => `\${${varName}}`,
  );
}

export function interpolateEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVarsInString(obj, env);
  }
  if (Array.isArray(obj)) {
    const result: unknown[] = [];
    for (const item of obj) {
      const interpolated = interpolateEnvVars(item, env);
      if (interpolated instanceof ConfigError) return interpolated;
      result.push(interpolated);
    }
    return result;
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const interpolated = interpolateEnvVars(value, env);
      if (interpolated instanceof ConfigError) return interpolated;
      result[key] = interpolated;
    }
    return result;
  }
  return obj;
}

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function section(partial: Record<string, unknown>, key: string): Record<string, unknown> {
  return safeRecord(partial[key], {});
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    server: { ...DEFAULT_CONFIG.server, ...section(partial, 'server') },
    auth: { ...DEFAULT_CONFIG.auth, ...section(partial, 'auth') },
    posts: { ...DEFAULT_CONFIG.posts, ...section(partial, 'posts') },
  };
}

// --- Main ---

/**
 * Validate an already-parsed config object and fill in defaults.
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Result<BlogboardConfig, ConfigError> {
  if (raw === null || raw === undefined || typeof raw !== 'object' || Array.isArray(raw)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  // Interpolate environment variables (e.g., ${BLOGBOARD_JWT_SECRET})
  const interpolated = interpolateEnvVars(raw, env);
  if (interpolated instanceof ConfigError) {
    return err(interpolated);
  }

  const withDefaults = applyDefaults(safeRecord(interpolated));

  const validationResult = blogboardConfigSchema.safeParse(withDefaults);
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

export async function loadConfig(rootDir: string): Promise<Result<BlogboardConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    return err(new ConfigError(`Config file not found: ${configPath}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed);
}

/**
 * Render a config as YAML, as written by `blogboard init`.
 */
export function serializeConfig(config: BlogboardConfig): string {
  return stringify(config);
}
