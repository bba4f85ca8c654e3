import type {
  LineEnding,
  PipelineFlags,
  TransformName,
  TransformOptions,
  VCardRecord,
} from '../types/index.js';
import { TRANSFORM_NAMES } from '../types/index.js';
import { TRANSFORMS, DEFAULT_TRANSFORM_OPTIONS } from '../transforms/index.js';
import {
  detectLineEnding,
  loadRecords,
  renderRecords,
  selectRecords,
  sortRecords,
  type DeleteDecision,
} from '../vcard/index.js';
import { logger } from '../utils/index.js';

export type LineEndingSetting = LineEnding | 'auto';

export interface OutputOptions {
  /** `auto` keeps the input's line endings. */
  lineEnding?: LineEndingSetting;
  foldWidth?: number;
}

export interface ProcessOptions extends OutputOptions {
  operations: readonly TransformName[];
  sort?: boolean;
  transformOptions?: TransformOptions;
}

export interface ProcessResult {
  text: string;
  records: VCardRecord[];
  applied: TransformName[];
  sorted: boolean;
}

export interface PruneResult {
  text: string;
  kept: VCardRecord[];
  deleted: VCardRecord[];
}

/** Requested transforms in canonical order. */
export function operationsFromFlags(flags: Partial<PipelineFlags>): TransformName[] {
  return TRANSFORM_NAMES.filter(name => flags[name] === true);
}

/** Apply each operation to every record, in the order given; repeats are dropped. */
export function runTransforms(
  records: readonly VCardRecord[],
  operations: readonly TransformName[],
  options: TransformOptions = DEFAULT_TRANSFORM_OPTIONS,
): VCardRecord[] {
  return [...new Set(operations)].reduce<VCardRecord[]>(
    (current, name) => current.map(record => TRANSFORMS[name].apply(record, options)),
    [...records],
  );
}

export function resolveLineEnding(setting: LineEndingSetting | undefined, input: string): LineEnding {
  return setting === undefined || setting === 'auto' ? detectLineEnding(input) : setting;
}

/**
 * Parse, transform, optionally sort and re-render a whole document.
 *
 * @throws MalformedDocumentError before any transform runs.
 */
export function processDocument(text: string, options: ProcessOptions): ProcessResult {
  const records = loadRecords(text);
  const applied = [...new Set(options.operations)];
  logger.debug(`Loaded ${records.length} records, applying: ${applied.join(', ') || '(none)'}`);

  const transformed = runTransforms(records, applied, options.transformOptions);
  const sorted = options.sort === true;
  const output = sorted ? sortRecords(transformed) : transformed;

  return {
    text: renderRecords(output, {
      lineEnding: resolveLineEnding(options.lineEnding, text),
      foldWidth: options.foldWidth,
    }),
    records: output,
    applied,
    sorted,
  };
}

/** Drop the records `decide` picks and re-render the rest. */
export function pruneDocument(text: string, decide: DeleteDecision, options: OutputOptions = {}): PruneResult {
  const { kept, deleted } = selectRecords(loadRecords(text), decide);
  return {
    text: renderRecords(kept, {
      lineEnding: resolveLineEnding(options.lineEnding, text),
      foldWidth: options.foldWidth,
    }),
    kept,
    deleted,
  };
}
