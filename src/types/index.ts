export type { VCardParam, VCardField, VCardRecord, LineEnding, RenderOptions } from './vcard.js';
export {
  TRANSFORM_NAMES,
  type TransformName,
  type TransformOptions,
  type TransformFn,
  type Transform,
  type PipelineFlags,
} from './pipeline.js';
