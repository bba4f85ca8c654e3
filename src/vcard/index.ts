export {
  parseField,
  serializeField,
  findValueSeparator,
  hasValueSeparator,
  fieldIs,
  getParam,
  hasParam,
  withoutParams,
  isTypeParam,
  typeTokens,
  isQuotedPrintable,
  isQuotedPrintableLine,
  ENCODING_TOKENS,
} from './field.js';
export { splitStructured, unescapeText, escapeUnescaped } from './escape.js';
export { decodeQuotedPrintable } from './quoted-printable.js';
export { splitPhysicalLines, unfoldLines, foldLines } from './lines.js';
export { splitRecords } from './record.js';
export { loadRecords, renderRecords, detectLineEnding } from './document.js';
export { contactNameKey, nameFromN } from './name.js';
export { sortRecords } from './sort.js';
export { selectRecords, type DeleteDecision, type Selection } from './select.js';
