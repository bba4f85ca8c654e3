import type { VCardField, VCardRecord } from '../types/index.js';
import { decodeQuotedPrintable, getParam, isQuotedPrintable, withoutParams } from '../vcard/index.js';
import { UnsupportedEncodingError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const QP_PARAMS = ['ENCODING', 'CHARSET', 'QUOTED-PRINTABLE'];

/**
 * Decode a quoted-printable field into plain text, dropping its ENCODING and
 * CHARSET parameters. Line breaks in the decoded text become `\n` so the
 * field stays on one line. Returns undefined when the value can't be decoded.
 */
export function decodeField(field: VCardField): VCardField | undefined {
  try {
    const decoded = decodeQuotedPrintable(field.value, getParam(field, 'CHARSET'));
    return { ...withoutParams(field, QP_PARAMS), value: decoded.replace(/\r\n|\r|\n/g, '\\n') };
  } catch (err) {
    if (!(err instanceof UnsupportedEncodingError)) throw err;
    logger.warn(`Leaving ${field.name} encoded: ${err.message}`);
    return undefined;
  }
}

export function convertToReadable(record: VCardRecord): VCardRecord {
  return {
    fields: record.fields.map(field => (isQuotedPrintable(field) ? decodeField(field) ?? field : field)),
  };
}
