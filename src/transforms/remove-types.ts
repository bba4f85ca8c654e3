import type { VCardRecord } from '../types/index.js';
import { fieldIs, isTypeParam } from '../vcard/index.js';

/** Drop TYPE parameters and bare 2.1 type tokens from every TEL. */
export function removeContactTypes(record: VCardRecord): VCardRecord {
  return {
    fields: record.fields.map(field =>
      fieldIs(field, 'TEL') ? { ...field, params: field.params.filter(p => !isTypeParam(p)) } : field,
    ),
  };
}
