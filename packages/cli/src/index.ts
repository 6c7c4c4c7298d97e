#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerInitCommand } from './commands/init.js';
import { registerServeCommand } from './commands/serve.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();
program
  .name('blogboard')
  .description('Blogboard: a small blog-post API with bearer-token auth')
  .version(version);

registerInitCommand(program);
registerServeCommand(program);

program.parse();
