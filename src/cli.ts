#!/usr/bin/env node
/**
 * crabgrounds CLI entry point.
 */

import { CommanderError } from 'commander';
import { createProgram } from './program.js';

const program = createProgram();

// Show help if no command
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  throw error;
}
