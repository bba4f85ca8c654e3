/**
 * Process command - runs the selected transforms over a VCF file
 */

import chalk from 'chalk';
import { z } from 'zod';
import type { PipelineFlags } from '../../types/index.js';
import { TRANSFORMS } from '../../transforms/index.js';
import { operationsFromFlags, processDocument } from '../../pipeline/index.js';
import { loadConfig, transformOptionsFor } from '../../config.js';
import {
  deriveOutputPath,
  errorMessage,
  NoOperationError,
  readTextFile,
  writeFileAtomic,
} from '../../utils/index.js';

const ProcessOptionsSchema = z.object({
  input: z.string(),
  output: z.string().optional(),
  config: z.string().optional(),
  readable: z.boolean().optional(),
  removePictures: z.boolean().optional(),
  formatNumbers: z.boolean().optional(),
  formatNames: z.boolean().optional(),
  removeTypes: z.boolean().optional(),
  autoSetTypes: z.boolean().optional(),
  updateVersion: z.boolean().optional(),
  sort: z.boolean().optional(),
});

export type ProcessCommandOptions = z.infer<typeof ProcessOptionsSchema>;

const NO_OPERATION_HELP =
  'At least one operation must be specified. Use -r/--readable, --remove-pictures, --format-numbers, '
  + '--format-names, --remove-types, --auto-set-types, -u/--update-version and/or -s/--sort';

export function flagsFromOptions(options: ProcessCommandOptions): PipelineFlags {
  return {
    readable: options.readable ?? false,
    removePictures: options.removePictures ?? false,
    formatNumbers: options.formatNumbers ?? false,
    formatNames: options.formatNames ?? false,
    removeTypes: options.removeTypes ?? false,
    autoSetTypes: options.autoSetTypes ?? false,
    upgradeVersion: options.updateVersion ?? false,
    sort: options.sort ?? false,
  };
}

export async function processCommand(opts: ProcessCommandOptions): Promise<void> {
  try {
    const options = ProcessOptionsSchema.parse(opts);
    const flags = flagsFromOptions(options);
    const operations = operationsFromFlags(flags);
    if (operations.length === 0 && !flags.sort) throw new NoOperationError(NO_OPERATION_HELP);

    const config = await loadConfig(options.config);
    const input = await readTextFile(options.input);
    const result = processDocument(input, {
      operations,
      sort: flags.sort,
      transformOptions: transformOptionsFor(config),
      lineEnding: config.lineEnding,
      foldWidth: config.foldWidth,
    });

    const outputPath = options.output ?? deriveOutputPath(options.input, config.processedSuffix);
    await writeFileAtomic(outputPath, result.text);

    for (const name of result.applied) {
      console.log(chalk.green('✓'), TRANSFORMS[name].summary);
    }
    if (result.sorted) console.log(chalk.green('✓'), 'Sorted contacts by name');
    console.log(`Processed VCF file saved to: ${chalk.bold(outputPath)}`);
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exitCode = 1;
  }
}
