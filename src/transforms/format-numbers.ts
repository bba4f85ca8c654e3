import type { TransformOptions, VCardRecord } from '../types/index.js';
import { fieldIs } from '../vcard/index.js';

const LEADING_SEPARATORS = /^[\s\-./\\]+/;
const PHONE_CHARS = /^[\d\s\-./()]+$/;

/**
 * Strip a leading `+<callingCode>` and group a 9-digit national number as
 * `XXX XXX XXX`. Values with anything but digits and separators left after
 * the prefix are only stripped.
 */
export function formatPhoneNumber(value: string, callingCode: string): string {
  const prefix = `+${callingCode}`;
  const trimmed = value.trim();
  const rest = trimmed.startsWith(prefix)
    ? trimmed.substring(prefix.length).replace(LEADING_SEPARATORS, '')
    : value;

  if (!PHONE_CHARS.test(rest)) return rest;
  const digits = rest.replace(/\D/g, '');
  if (digits.length !== 9) return rest;
  return `${digits.slice(0, 3)} ${digits.slice(3, 6)} ${digits.slice(6)}`;
}

export function formatContactNumbers(record: VCardRecord, options: TransformOptions): VCardRecord {
  return {
    fields: record.fields.map(field =>
      fieldIs(field, 'TEL') ? { ...field, value: formatPhoneNumber(field.value, options.callingCode) } : field,
    ),
  };
}
