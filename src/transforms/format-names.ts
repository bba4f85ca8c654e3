import type { VCardField, VCardRecord } from '../types/index.js';
import { fieldIs, nameFromN } from '../vcard/index.js';

/** Carried from N to a synthesized FN so an encoded name stays decodable. */
const ENCODING_PARAMS = new Set(['CHARSET', 'ENCODING', 'QUOTED-PRINTABLE']);

/**
 * Make sure the record has a usable FN. An existing non-empty FN wins;
 * otherwise one is built from N and placed right before it. Without a
 * usable N, empty FN fields are dropped.
 */
export function formatContactNames(record: VCardRecord): VCardRecord {
  const fn = record.fields.filter(f => fieldIs(f, 'FN'));
  if (fn.some(f => f.value.trim() !== '')) return record;

  const n = record.fields.find(f => fieldIs(f, 'N'));
  const name = n ? nameFromN(n.value) : '';
  if (!n || !name) {
    return fn.length === 0 ? record : { fields: record.fields.filter(f => !fieldIs(f, 'FN')) };
  }

  const synthesized: VCardField = {
    name: 'FN',
    params: n.params.filter(p => ENCODING_PARAMS.has(p.key.toUpperCase())),
    value: name,
  };
  const fields = record.fields.filter(f => !fieldIs(f, 'FN'));
  fields.splice(fields.indexOf(n), 0, synthesized);
  return { fields };
}
