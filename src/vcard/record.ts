import type { VCardField, VCardRecord } from '../types/index.js';
import { MalformedDocumentError } from '../utils/errors.js';
import { hasValueSeparator, parseField } from './field.js';

/**
 * Partition logical lines into records. Lines outside BEGIN/END and blank
 * lines inside a record are dropped. Line numbers in errors are 1-based
 * logical lines.
 */
export function splitRecords(lines: readonly string[]): VCardRecord[] {
  const records: VCardRecord[] = [];
  let current: VCardField[] | undefined;
  let openedAt = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const marker = line.trim().toUpperCase();

    if (marker === 'BEGIN:VCARD') {
      if (current) throw new MalformedDocumentError('BEGIN:VCARD inside an open record', i + 1);
      current = [];
      openedAt = i + 1;
      continue;
    }

    if (marker === 'END:VCARD') {
      if (!current) throw new MalformedDocumentError('END:VCARD without a matching BEGIN:VCARD', i + 1);
      records.push({ fields: current });
      current = undefined;
      continue;
    }

    if (!current || marker === '') continue;

    if (!hasValueSeparator(line)) {
      throw new MalformedDocumentError(`Property line has no ':' separator: ${line}`, i + 1);
    }
    current.push(parseField(line));
  }

  if (current) throw new MalformedDocumentError('Record opened here has no END:VCARD', openedAt);

  return records;
}
