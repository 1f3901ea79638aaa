#!/usr/bin/env node
/**
 * @module specmock-cli
 * CLI entry point for specmock.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
