import type { VCardRecord } from '../types/index.js';
import { contactNameKey } from './name.js';

/** Returns true to delete the record. `index` is 1-based. */
export type DeleteDecision = (index: number, displayName: string) => boolean;

export interface Selection {
  kept: VCardRecord[];
  deleted: VCardRecord[];
}

/**
 * Split records into kept and deleted, asking `decide` once per record in
 * input order. Records are passed through untouched.
 */
export function selectRecords(records: readonly VCardRecord[], decide: DeleteDecision): Selection {
  const selection: Selection = { kept: [], deleted: [] };
  records.forEach((record, i) => {
    if (decide(i + 1, contactNameKey(record))) {
      selection.deleted.push(record);
    } else {
      selection.kept.push(record);
    }
  });
  return selection;
}
