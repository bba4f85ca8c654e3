import type { VCardField, VCardParam, VCardRecord } from '../types/index.js';
import { ENCODING_TOKENS, escapeUnescaped, fieldIs, isQuotedPrintable, splitStructured } from '../vcard/index.js';
import { decodeField } from './readable.js';

const TEXT_PROPERTIES = new Set(['FN', 'NOTE', 'TITLE', 'ROLE', 'LABEL']);
const STRUCTURED_PROPERTIES = new Set(['N', 'ADR', 'ORG']);
const LIST_PROPERTIES = new Set(['CATEGORIES', 'NICKNAME']);

/**
 * Upgrade a 2.1 record to 3.0. Records at any other version (or without
 * one) are returned as-is.
 *
 * 3.0 has no quoted-printable and no CHARSET, knows only `ENCODING=b`, wants
 * every type as `TYPE=` and requires `,` `;` `\` escaped in text values.
 */
export function upgradeVersion(record: VCardRecord): VCardRecord {
  const version = record.fields.find(f => fieldIs(f, 'VERSION'));
  if (!version || version.value.trim() !== '2.1') return record;

  const rest = record.fields.filter(f => f !== version).map(upgradeField);
  return { fields: [{ ...version, value: '3.0' }, ...rest] };
}

function upgradeField(field: VCardField): VCardField {
  let source = field;
  if (isQuotedPrintable(field)) {
    const decoded = decodeField(field);
    // Undecodable values are left exactly as they were
    if (!decoded) return field;
    source = decoded;
  }
  return { ...source, params: upgradeParams(source.params), value: escapeValue(source) };
}

function upgradeParams(params: readonly VCardParam[]): VCardParam[] {
  const result: VCardParam[] = [];
  const types: string[] = [];
  let typeSlot = -1;

  for (const param of params) {
    const key = param.key.toUpperCase();

    if (param.value === undefined) {
      if (key === '') continue;
      if (ENCODING_TOKENS.has(key)) {
        const encoding = upgradeEncoding(key);
        if (encoding) result.push({ key: 'ENCODING', value: encoding });
        continue;
      }
      if (typeSlot === -1) typeSlot = result.length;
      types.push(param.key.toLowerCase());
      continue;
    }

    if (key === 'TYPE') {
      if (typeSlot === -1) typeSlot = result.length;
      types.push(...param.value.replace(/"/g, '').split(',').filter(t => t).map(t => t.toLowerCase()));
    } else if (key === 'ENCODING') {
      const encoding = upgradeEncoding(param.value);
      if (encoding) result.push({ key: param.key, value: encoding });
    } else if (key !== 'CHARSET') {
      result.push(param);
    }
  }

  if (typeSlot !== -1 && types.length > 0) {
    result.splice(typeSlot, 0, { key: 'TYPE', value: [...new Set(types)].join(',') });
  }
  return result;
}

function upgradeEncoding(encoding: string): string | undefined {
  switch (encoding.toUpperCase()) {
    case 'BASE64':
    case 'B':
      return 'b';
    case '7BIT':
    case '8BIT':
      return undefined;
    default:
      return encoding;
  }
}

function escapeValue(field: VCardField): string {
  const name = field.name.toUpperCase();
  if (TEXT_PROPERTIES.has(name)) return escapeUnescaped(field.value, ',;');
  if (STRUCTURED_PROPERTIES.has(name)) {
    return splitStructured(field.value).map(part => escapeUnescaped(part, ',')).join(';');
  }
  if (LIST_PROPERTIES.has(name)) return escapeUnescaped(field.value, ';');
  return field.value;
}
