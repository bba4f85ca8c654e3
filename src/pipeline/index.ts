export {
  operationsFromFlags,
  runTransforms,
  resolveLineEnding,
  processDocument,
  pruneDocument,
  type LineEndingSetting,
  type OutputOptions,
  type ProcessOptions,
  type ProcessResult,
  type PruneResult,
} from './engine.js';
