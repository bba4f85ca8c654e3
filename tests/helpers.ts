import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { VCardRecord } from '../src/types/index.js';
import { parseField, serializeField } from '../src/vcard/index.js';

/** Build a record from property lines (no BEGIN/END). */
export function makeRecord(...lines: string[]): VCardRecord {
  return { fields: lines.map(parseField) };
}

export function recordLines(record: VCardRecord): string[] {
  return record.fields.map(serializeField);
}

/** Join lines into a LF document with a trailing newline. */
export function doc(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

/** Create a temp directory for file-based tests. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vcf-tools-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}
