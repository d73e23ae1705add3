#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for docbinder.
 * Commands are thin wrappers around the @docbinder/epub library.
 */

import { Command } from 'commander';
import chalk from 'chalk';

// Loads .env before the logger reads LOG_LEVEL
import './config/index.js';
import { buildCommand } from './commands/build.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('docbinder')
  .description('Package extracted API documentation as an EPUB')
  .version('0.1.0')
  .enablePositionalOptions();

program
  .command('build <entities>')
  .description('Build an EPUB from a JSON file of documented entities')
  .option('-o, --output <dir>', 'Output directory (replaced on every run)')
  .option('-p, --project <name>', 'Project name')
  .option('-V, --version <version>', 'Project version')
  .option('-l, --logo <path>', 'Logo image (.png, .jpg, .jpeg or .svg)')
  .option('-e, --extra <path>', 'Markdown page to include (repeatable)', collect, [])
  .option('--language <tag>', 'Book language', 'en')
  .option('-c, --concurrency <count>', 'Maximum pages rendered at once')
  .option('--json', 'Output in JSON format')
  .action(buildCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('docbinder --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
