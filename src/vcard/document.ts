import type { LineEnding, RenderOptions, VCardRecord } from '../types/index.js';
import { serializeField } from './field.js';
import { foldLines, splitPhysicalLines, unfoldLines } from './lines.js';
import { splitRecords } from './record.js';

/**
 * Parse a VCF document into records.
 *
 * @throws MalformedDocumentError on unmatched or unterminated records.
 */
export function loadRecords(text: string): VCardRecord[] {
  return splitRecords(unfoldLines(splitPhysicalLines(text)));
}

/**
 * Serialize records, one property per line (folded only when `foldWidth`
 * is set) with a blank line between records.
 */
export function renderRecords(records: readonly VCardRecord[], options: RenderOptions = {}): string {
  if (records.length === 0) return '';
  const eol = options.lineEnding === 'crlf' ? '\r\n' : '\n';
  const lines: string[] = [];
  records.forEach((record, i) => {
    if (i > 0) lines.push('');
    lines.push('BEGIN:VCARD', ...foldLines(record.fields.map(serializeField), options.foldWidth), 'END:VCARD');
  });
  return lines.join(eol) + eol;
}

export function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') ? 'crlf' : 'lf';
}
