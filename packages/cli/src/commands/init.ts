import { Command } from 'commander';
import chalk from 'chalk';
import { randomBytes } from 'node:crypto';
import { access, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  serializeConfig,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  type BlogboardConfig,
} from '@blogboard/core';

/**
 * Default config with a freshly generated signing secret.
 */
export function buildInitialConfig(): BlogboardConfig {
  return {
    ...DEFAULT_CONFIG,
    auth: { ...DEFAULT_CONFIG.auth, jwtSecret: randomBytes(32).toString('hex') },
  };
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write `.blogboard.yaml` into `rootDir`. Refuses to replace an existing
 * file unless `force` is set. Resolves with the written path.
 */
export async function writeInitialConfig(
  rootDir: string,
  options: { force?: boolean } = {},
): Promise<Result<string, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  if (!options.force && (await fileExists(configPath))) {
    return err(new ConfigError(`${CONFIG_FILE_NAME} already exists.`));
  }

  await writeFile(configPath, serializeConfig(buildInitialConfig()), 'utf-8');
  return ok(configPath);
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a .blogboard.yaml in the current directory')
    .option('--force', 'Overwrite existing configuration file')
    .action(async (options: { force?: boolean }) => {
      try {
        const written = await writeInitialConfig(process.cwd(), options);

        if (written.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(written.error.message), 'Use --force to overwrite.');
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(chalk.green('Created'), written.value);
        // eslint-disable-next-line no-console
        console.log(chalk.dim('Run "blogboard serve" to start the API server.'));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Init failed:'), message);
        process.exit(1);
      }
    });
}
