export { logger } from './logger.js';
export {
  MalformedDocumentError,
  UnsupportedEncodingError,
  ConfigError,
  NoOperationError,
  errorMessage,
} from './errors.js';
export { deriveOutputPath, readTextFile, writeFileAtomic } from './fs.js';
