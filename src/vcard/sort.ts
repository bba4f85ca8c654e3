import type { VCardRecord } from '../types/index.js';
import { contactNameKey } from './name.js';

/**
 * Order records by contact name, case-insensitively and by code unit so the
 * result does not depend on the host locale. Equal names keep input order.
 */
export function sortRecords(records: readonly VCardRecord[]): VCardRecord[] {
  return records
    .map((record, index) => ({ record, index, key: contactNameKey(record).toLowerCase() }))
    .sort((a, b) => compareOrdinal(a.key, b.key) || a.index - b.index)
    .map(entry => entry.record);
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
