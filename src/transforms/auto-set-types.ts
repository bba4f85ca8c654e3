import type { TransformOptions, VCardRecord } from '../types/index.js';
import { fieldIs, isTypeParam } from '../vcard/index.js';

export type InferredPhoneType = 'HOME' | 'CELL' | 'VOICE';

/**
 * Classify a number by its first national digit: 2 is a landline, 9 a
 * mobile. The calling code is stripped with or without its `+`. A number
 * still starting with `+` belongs to another country and is assumed to be a
 * mobile.
 */
export function inferPhoneType(value: string, callingCode: string): InferredPhoneType {
  const prefix = `+${callingCode}`;
  let number = value.trim().replace(/[\s-]/g, '');
  if (number.startsWith(prefix)) {
    number = number.substring(prefix.length);
  } else if (number.startsWith(callingCode)) {
    number = number.substring(callingCode.length);
  }

  if (number.startsWith('2')) return 'HOME';
  if (number.startsWith('9') || number.startsWith('+')) return 'CELL';
  return 'VOICE';
}

/** Add `TYPE=` to every TEL that has no type yet and holds at least one digit. */
export function autoSetContactTypes(record: VCardRecord, options: TransformOptions): VCardRecord {
  return {
    fields: record.fields.map(field => {
      if (!fieldIs(field, 'TEL') || field.params.some(isTypeParam) || !/\d/.test(field.value)) return field;
      const type = inferPhoneType(field.value, options.callingCode);
      return { ...field, params: [...field.params, { key: 'TYPE', value: type }] };
    }),
  };
}
