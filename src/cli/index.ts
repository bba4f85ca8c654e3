#!/usr/bin/env node

/**
 * CLI entry point: batch cleanup (`process`) and interactive deletion (`prune`).
 */

import { Command } from 'commander';
import { processCommand } from './commands/process.js';
import { pruneCommand } from './commands/prune.js';
import { logger } from '../utils/index.js';

const program = new Command();

program
  .name('vcf-tools')
  .description('Clean up vCard (.vcf) contact files')
  .version('0.1.0');

program
  .command('process')
  .description('Apply cleanup operations to a VCF file')
  .requiredOption('-i, --input <path>', 'Path to the input VCF file')
  .option('-o, --output <path>', 'Path to the output VCF file (default: input path with "_processed" suffix)')
  .option('-c, --config <path>', 'Path to a config file')
  .option('-r, --readable', 'Convert quoted-printable encoding to readable format')
  .option('--remove-pictures', 'Remove contact pictures')
  .option('--format-numbers', 'Strip the national prefix and format 9-digit numbers as XXX XXX XXX')
  .option('--format-names', 'Build a missing FN from the N field')
  .option('--remove-types', 'Remove existing phone number types')
  .option('--auto-set-types', 'Set phone number types from their leading digit')
  .option('-u, --update-version', 'Upgrade VCF from version 2.1 to 3.0')
  .option('-s, --sort', 'Sort contacts by name')
  .action(processCommand);

program
  .command('prune')
  .description('Walk through the contacts and choose which ones to delete')
  .requiredOption('-i, --input <path>', 'Path to the input VCF file')
  .option('-o, --output <path>', 'Path to the output VCF file (default: input path with "_cleaned" suffix)')
  .option('-c, --config <path>', 'Path to a config file')
  .action(pruneCommand);

program.parseAsync().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
