import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  loadConfig,
  safeInteger,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  type BlogboardConfig,
} from '@blogboard/core';

export interface LoadedServerConfig {
  readonly config: BlogboardConfig;
  /** True when no config file exists and DEFAULT_CONFIG was used. */
  readonly usedDefaults: boolean;
}

/**
 * Load `.blogboard.yaml` from `rootDir`. A missing file is not an error for
 * a server: it runs on DEFAULT_CONFIG. A file that fails to parse or
 * validate is.
 */
export async function loadServerConfig(
  rootDir: string,
): Promise<Result<LoadedServerConfig, ConfigError>> {
  if (!existsSync(join(rootDir, CONFIG_FILE_NAME))) {
    return ok({ config: DEFAULT_CONFIG, usedDefaults: true });
  }

  const loaded = await loadConfig(rootDir);
  return loaded.map((config) => ({ config, usedDefaults: false }));
}

/**
 * Parse a TCP port given on the command line or in the environment.
 */
export function parsePort(value: string): Result<number, ConfigError> {
  const port = safeInteger(value, Number.NaN);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    return err(new ConfigError(`Invalid port number: ${value}`));
  }
  return ok(port);
}

/**
 * Apply a port override, if any, to `config`.
 */
export function applyPortOverride(
  config: BlogboardConfig,
  override: string | undefined,
): Result<BlogboardConfig, ConfigError> {
  if (override === undefined || override === '') {
    return ok(config);
  }
  return parsePort(override).map((port) => ({
    ...config,
    server: { ...config.server, port },
  }));
}
