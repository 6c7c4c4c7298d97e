import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_JWT_SECRET } from '@blogboard/core';
import { ApiServer, applyPortOverride, loadServerConfig } from '@blogboard/api-server';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the Blogboard API server')
    .option('--port <port>', 'Port to listen on (overrides config and BLOGBOARD_PORT)')
    .action(async (options: { port?: string }) => {
      try {
        const rootDir = process.cwd();

        const loaded = await loadServerConfig(rootDir);
        if (loaded.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[blogboard] Invalid configuration:'), loaded.error.message);
          process.exit(1);
        }

        if (loaded.value.usedDefaults) {
          // eslint-disable-next-line no-console
          console.error(chalk.yellow('[blogboard] No .blogboard.yaml found, using defaults. Run "blogboard init" to create one.'));
        }

        const configured = applyPortOverride(
          loaded.value.config,
          options.port ?? process.env['BLOGBOARD_PORT'],
        );
        if (configured.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[blogboard] Invalid port number'));
          process.exit(1);
        }

        const config = configured.value;
        if (config.auth.jwtSecret === DEFAULT_JWT_SECRET) {
          // eslint-disable-next-line no-console
          console.error(chalk.yellow('[blogboard] auth.jwtSecret is the development default'));
        }

        const server = new ApiServer({ config, logRequests: true });

        // Graceful shutdown
        const shutdown = (): void => {
          // eslint-disable-next-line no-console
          console.error(chalk.blue('[blogboard]'), 'Shutting down...');
          server.close().finally(() => process.exit(0));
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);

        // eslint-disable-next-line no-console
        console.error(chalk.blue('[blogboard]'), `Starting API server on port ${config.server.port}...`);
        const port = await server.start();
        // eslint-disable-next-line no-console
        console.error(chalk.green('[blogboard]'), `API server running on http://localhost:${port}`);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('[blogboard] Server failed:'), message);
        process.exit(1);
      }
    });
}
