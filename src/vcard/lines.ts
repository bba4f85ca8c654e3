import { isQuotedPrintableLine } from './field.js';

/** Split text into physical lines. CRLF, LF and lone CR all count; a BOM is dropped. */
export function splitPhysicalLines(text: string): string[] {
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const lines = body.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Join continued physical lines into logical property lines.
 *
 * A line starting with a space or tab continues the previous one (RFC 2425
 * folding, the whitespace is dropped). A quoted-printable line ending in `=`
 * is a soft break: the `=` goes and the next line is appended verbatim.
 */
export function unfoldLines(rawLines: readonly string[]): string[] {
  const result: string[] = [];
  let softBreak = false;

  for (const line of rawLines) {
    if (softBreak) {
      result[result.length - 1] += line;
    } else if ((line.startsWith(' ') || line.startsWith('\t')) && result.length > 0) {
      result[result.length - 1] += line.substring(1);
    } else {
      result.push(line);
    }

    const current = result[result.length - 1];
    softBreak = current.endsWith('=') && isQuotedPrintableLine(current);
    if (softBreak) result[result.length - 1] = current.slice(0, -1);
  }

  return result;
}

/**
 * Fold logical lines longer than `maxOctets` UTF-8 octets into continuation
 * lines starting with a space. Without a width every line is kept whole.
 * Quoted-printable lines are never folded: a leading space would become part
 * of the encoded value.
 */
export function foldLines(lines: readonly string[], maxOctets?: number): string[] {
  if (!maxOctets) return [...lines];
  return lines.flatMap(line =>
    isQuotedPrintableLine(line) ? [line] : foldLine(line, maxOctets),
  );
}

function foldLine(line: string, maxOctets: number): string[] {
  if (Buffer.byteLength(line, 'utf-8') <= maxOctets) return [line];
  const result: string[] = [];
  let remaining = line;
  let first = true;
  while (Buffer.byteLength(remaining, 'utf-8') > (first ? maxOctets : maxOctets - 1)) {
    const limit = first ? maxOctets : maxOctets - 1; // continuation lines lose 1 octet to the leading space
    let cutPoint = Math.min(limit, remaining.length);
    while (cutPoint > 1 && Buffer.byteLength(remaining.substring(0, cutPoint), 'utf-8') > limit) {
      cutPoint--;
    }
    // Don't split a surrogate pair
    if (cutPoint > 1 && isHighSurrogate(remaining.charCodeAt(cutPoint - 1))) cutPoint--;
    result.push(first ? remaining.substring(0, cutPoint) : ` ${remaining.substring(0, cutPoint)}`);
    remaining = remaining.substring(cutPoint);
    first = false;
  }
  if (remaining) result.push(first ? remaining : ` ${remaining}`);
  return result;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
