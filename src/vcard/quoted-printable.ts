import { TextDecoder } from 'node:util';
import { UnsupportedEncodingError } from '../utils/errors.js';

const EQUALS = 0x3d;
const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

/**
 * Decode a quoted-printable value. `=XX` escapes become raw bytes, every
 * other character contributes its UTF-8 bytes, and the byte string is then
 * read in `charset`. Soft line breaks are expected to be gone already
 * (see `unfoldLines`).
 *
 * @throws UnsupportedEncodingError when the charset is unknown or the bytes
 * are not valid in it.
 */
export function decodeQuotedPrintable(value: string, charset = 'UTF-8'): string {
  const input = Buffer.from(value, 'utf-8');
  const bytes: number[] = [];

  for (let i = 0; i < input.length; i++) {
    const byte = input[i];
    if (byte === EQUALS && i + 2 < input.length) {
      const hex = String.fromCharCode(input[i + 1], input[i + 2]);
      if (HEX_PAIR.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 2;
        continue;
      }
    }
    bytes.push(byte);
  }

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: true });
  } catch (err) {
    throw new UnsupportedEncodingError(charset, err instanceof Error ? err.message : undefined);
  }

  try {
    return decoder.decode(Uint8Array.from(bytes));
  } catch {
    throw new UnsupportedEncodingError(charset, 'value is not valid in this charset');
  }
}
