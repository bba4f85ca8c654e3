import type { VCardRecord } from '../types/index.js';
import { fieldIs } from '../vcard/index.js';

/** Folded base64 data was joined into the PHOTO line on load, so dropping the field drops all of it. */
export function removeContactPictures(record: VCardRecord): VCardRecord {
  return { fields: record.fields.filter(field => !fieldIs(field, 'PHOTO')) };
}
