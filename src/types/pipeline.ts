import type { VCardRecord } from './vcard.js';

export const TRANSFORM_NAMES = [
  'readable',
  'removePictures',
  'formatNumbers',
  'formatNames',
  'removeTypes',
  'autoSetTypes',
  'upgradeVersion',
] as const;

export type TransformName = typeof TRANSFORM_NAMES[number];

export interface TransformOptions {
  /** National calling code without the plus sign, e.g. `351`. */
  callingCode: string;
}

export type TransformFn = (record: VCardRecord, options: TransformOptions) => VCardRecord;

export interface Transform {
  name: TransformName;
  /** Shown in CLI help and MCP tool descriptions. */
  description: string;
  /** Past-tense progress line printed after the transform ran. */
  summary: string;
  apply: TransformFn;
}

export type PipelineFlags = Record<TransformName, boolean> & { sort: boolean };
