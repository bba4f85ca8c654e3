/**
 * Prune command - asks about every contact and saves the ones kept
 */

import * as readline from 'node:readline/promises';
import chalk from 'chalk';
import { z } from 'zod';
import type { VCardRecord } from '../../types/index.js';
import { contactNameKey, loadRecords, renderRecords, selectRecords } from '../../vcard/index.js';
import { resolveLineEnding } from '../../pipeline/index.js';
import { loadConfig } from '../../config.js';
import { deriveOutputPath, errorMessage, readTextFile, writeFileAtomic } from '../../utils/index.js';

const PruneOptionsSchema = z.object({
  input: z.string(),
  output: z.string().optional(),
  config: z.string().optional(),
});

export type PruneCommandOptions = z.infer<typeof PruneOptionsSchema>;

/** Asks one question and resolves with the raw answer. */
export type Ask = (question: string) => Promise<string>;

export interface PruneSummary {
  outputPath: string;
  total: number;
  kept: number;
  deleted: number;
}

const UNKNOWN_CONTACT = 'Unknown Contact';
const RULE = '-'.repeat(50);

/** Anything but Y, N or an empty answer asks again. */
async function askDelete(ask: Ask, index: number, name: string): Promise<boolean> {
  for (;;) {
    const answer = (await ask(`Contact ${index}: ${name} - Delete? (Y/N) [N]: `)).trim().toUpperCase();
    if (answer === '' || answer === 'N') return false;
    if (answer === 'Y') return true;
    console.log(chalk.yellow("  Invalid input. Please enter 'Y' to delete or 'N' to keep."));
  }
}

/** Prompt for every record in order; returns the 1-based indices to delete. */
export async function collectDeletions(records: readonly VCardRecord[], ask: Ask): Promise<Set<number>> {
  const toDelete = new Set<number>();
  for (const [i, record] of records.entries()) {
    const name = contactNameKey(record) || UNKNOWN_CONTACT;
    if (await askDelete(ask, i + 1, name)) {
      toDelete.add(i + 1);
      console.log(chalk.red(`  Deleted: ${name}`));
    } else {
      console.log(`  Kept: ${name}`);
    }
  }
  return toDelete;
}

/** Nothing is written until every contact has been answered. */
export async function runPrune(options: PruneCommandOptions, ask: Ask): Promise<PruneSummary> {
  const config = await loadConfig(options.config);
  const input = await readTextFile(options.input);
  const records = loadRecords(input);

  console.log('Starting contact deletion process...');
  console.log("For each contact, enter 'Y' to delete or 'N' to keep (default: N)");
  console.log(RULE);

  const toDelete = await collectDeletions(records, ask);
  const { kept, deleted } = selectRecords(records, index => toDelete.has(index));

  const outputPath = options.output ?? deriveOutputPath(options.input, config.cleanedSuffix);
  await writeFileAtomic(outputPath, renderRecords(kept, {
    lineEnding: resolveLineEnding(config.lineEnding, input),
    foldWidth: config.foldWidth,
  }));

  console.log(RULE);
  console.log('Process completed!');
  console.log(`Total contacts processed: ${records.length}`);
  console.log(`Contacts kept: ${kept.length}`);
  console.log(`Contacts deleted: ${deleted.length}`);
  console.log(`Cleaned VCF file saved to: ${chalk.bold(outputPath)}`);

  return { outputPath, total: records.length, kept: kept.length, deleted: deleted.length };
}

export async function pruneCommand(opts: PruneCommandOptions): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const controller = new AbortController();
  rl.on('SIGINT', () => controller.abort());

  try {
    const options = PruneOptionsSchema.parse(opts);
    await runPrune(options, question => rl.question(question, { signal: controller.signal }));
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      console.log(chalk.yellow('\nAborted, nothing was written.'));
      process.exitCode = 130;
    } else {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exitCode = 1;
    }
  } finally {
    rl.close();
  }
}
