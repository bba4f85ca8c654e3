import type { VCardField, VCardParam } from '../types/index.js';
import { MalformedDocumentError } from '../utils/errors.js';

/** Bare 2.1 tokens that name a transfer encoding rather than a type. */
export const ENCODING_TOKENS: ReadonlySet<string> = new Set(['QUOTED-PRINTABLE', 'BASE64', 'B', '8BIT', '7BIT']);

interface FieldHeader {
  group?: string;
  name: string;
  params: VCardParam[];
}

/**
 * Index of the first `:` outside double quotes and not escaped, or -1. A
 * `"` left unbalanced is taken literally (2.1 has no quoting).
 */
export function findValueSeparator(line: string): number {
  const quoted = scanValueSeparator(line, true);
  return quoted.balanced ? quoted.index : scanValueSeparator(line, false).index;
}

function scanValueSeparator(line: string, honourQuotes: boolean): { index: number; balanced: boolean } {
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '"' && honourQuotes) {
      inQuotes = !inQuotes;
    } else if (ch === ':' && !inQuotes) {
      return { index: i, balanced: true };
    }
  }
  return { index: -1, balanced: !inQuotes };
}

export function hasValueSeparator(line: string): boolean {
  return findValueSeparator(line) !== -1;
}

/** Parse `[group.]NAME[;PARAM...]:VALUE` into a field. */
export function parseField(line: string): VCardField {
  const sep = findValueSeparator(line);
  if (sep === -1) {
    throw new MalformedDocumentError(`Property line has no ':' separator: ${line}`);
  }
  const header = parseHeader(line.substring(0, sep));
  return { ...header, value: line.substring(sep + 1) };
}

export function serializeField(field: VCardField): string {
  const head = field.group === undefined ? field.name : `${field.group}.${field.name}`;
  const params = field.params
    .map(p => (p.value === undefined ? `;${p.key}` : `;${p.key}=${p.value}`))
    .join('');
  return `${head}${params}:${field.value}`;
}

function parseHeader(header: string): FieldHeader {
  const [first, ...rest] = splitOutsideQuotes(header, ';');
  const dot = first.indexOf('.');
  const params = rest.map((segment): VCardParam => {
    const eq = segment.indexOf('=');
    return eq === -1 ? { key: segment } : { key: segment.substring(0, eq), value: segment.substring(eq + 1) };
  });
  if (dot === -1) return { name: first, params };
  return { group: first.substring(0, dot), name: first.substring(dot + 1), params };
}

function splitOutsideQuotes(text: string, delimiter: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const ch of text) {
    if (ch === '"') inQuotes = !inQuotes;
    if (ch === delimiter && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  // Unbalanced quote: split on every delimiter
  return inQuotes ? text.split(delimiter) : parts;
}

function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

// --- Queries ---

export function fieldIs(field: VCardField, name: string): boolean {
  return field.name.toUpperCase() === name.toUpperCase();
}

/** Value of the first `key=value` parameter, quotes removed. */
export function getParam(field: VCardField, key: string): string | undefined {
  const upper = key.toUpperCase();
  const param = field.params.find(p => p.value !== undefined && p.key.toUpperCase() === upper);
  return param?.value === undefined ? undefined : unquote(param.value);
}

export function hasParam(field: VCardField, key: string): boolean {
  const upper = key.toUpperCase();
  return field.params.some(p => p.key.toUpperCase() === upper);
}

/** Copy of the field without any parameter (valued or bare) whose key is in `keys`. */
export function withoutParams(field: VCardField, keys: readonly string[]): VCardField {
  const drop = new Set(keys.map(k => k.toUpperCase()));
  return { ...field, params: field.params.filter(p => !drop.has(p.key.toUpperCase())) };
}

export function isTypeParam(param: VCardParam): boolean {
  const key = param.key.toUpperCase();
  if (param.value === undefined) return key !== '' && !ENCODING_TOKENS.has(key);
  return key === 'TYPE';
}

/**
 * Type tokens of a field: `TYPE=a,b` values plus 2.1 bare tokens such as
 * `HOME` or `CELL`. Case is kept as written.
 */
export function typeTokens(field: VCardField): string[] {
  return field.params.filter(isTypeParam).flatMap(p =>
    p.value === undefined ? [p.key] : unquote(p.value).split(',').filter(t => t.length > 0),
  );
}

export function isQuotedPrintable(field: Pick<VCardField, 'params'>): boolean {
  return field.params.some(p =>
    p.value === undefined
      ? p.key.toUpperCase() === 'QUOTED-PRINTABLE'
      : p.key.toUpperCase() === 'ENCODING' && unquote(p.value).toUpperCase() === 'QUOTED-PRINTABLE',
  );
}

/** Whether a raw (possibly partial) property line declares quoted-printable encoding. */
export function isQuotedPrintableLine(line: string): boolean {
  const sep = findValueSeparator(line);
  return isQuotedPrintable(parseHeader(sep === -1 ? line : line.substring(0, sep)));
}
