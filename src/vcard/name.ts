import type { VCardField, VCardRecord } from '../types/index.js';
import { UnsupportedEncodingError } from '../utils/errors.js';
import { fieldIs, getParam, isQuotedPrintable } from './field.js';
import { splitStructured, unescapeText } from './escape.js';
import { decodeQuotedPrintable } from './quoted-printable.js';

/**
 * Display name from an N value (Family;Given;Additional;Prefix;Suffix):
 * given, additional and family joined by spaces, empty parts skipped.
 * Components keep their escaping.
 */
export function nameFromN(value: string): string {
  const [family = '', given = '', additional = ''] = splitStructured(value);
  return [given, additional, family]
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .join(' ');
}

/**
 * Name used to sort records and to show them during pruning: the first
 * non-empty FN, else a name built from N, else the empty string.
 */
export function contactNameKey(record: VCardRecord): string {
  for (const field of record.fields) {
    if (!fieldIs(field, 'FN')) continue;
    const name = unescapeText(plainValue(field)).trim();
    if (name) return name;
  }
  const n = record.fields.find(f => fieldIs(f, 'N'));
  return n ? unescapeText(nameFromN(plainValue(n))) : '';
}

function plainValue(field: VCardField): string {
  if (!isQuotedPrintable(field)) return field.value;
  try {
    return decodeQuotedPrintable(field.value, getParam(field, 'CHARSET'));
  } catch (err) {
    if (err instanceof UnsupportedEncodingError) return field.value;
    throw err;
  }
}
