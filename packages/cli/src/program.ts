/**
 * @module specmock-cli/program
 * Commander program for specmock.
 *
 * Kept apart from the bin entry so tests can build and drive the program
 * without parsing process.argv.
 */

import { Command } from 'commander';
import { registerServe } from './commands/serve.js';
import { registerRoutes } from './commands/routes.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('specmock')
    .description('Mock HTTP server driven entirely by an OpenAPI contract')
    .version(VERSION);

  // Register sub-commands
  registerServe(program);
  registerRoutes(program);

  return program;
}
