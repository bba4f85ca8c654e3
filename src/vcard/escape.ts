/**
 * Backslash escaping for vCard text values.
 *
 *   \\ -> \     \; -> ;     \, -> ,     \n or \N -> newline
 *
 * 2.1 only knows `\;`; 3.0 requires `,` `;` and `\` to be escaped in text.
 */

const ESCAPABLE = new Set(['\\', ';', ',', 'n', 'N']);

/** Split a structured value (N, ADR, ORG) on unescaped `;`. Components stay escaped. */
export function splitStructured(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\' && i + 1 < value.length) {
      current += ch + value[++i];
    } else if (ch === ';') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_, c: string) => (c === 'n' || c === 'N' ? '\n' : c));
}

/**
 * Escape every occurrence of `chars` that is not already escaped, and every
 * backslash that does not start a valid escape sequence. Running it twice
 * gives the same result as running it once.
 */
export function escapeUnescaped(value: string, chars: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\') {
      const next = value[i + 1];
      if (next !== undefined && ESCAPABLE.has(next)) {
        out += ch + next;
        i++;
      } else {
        out += '\\\\';
      }
    } else if (chars.includes(ch)) {
      out += `\\${ch}`;
    } else {
      out += ch;
    }
  }
  return out;
}
