import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/** `contacts.vcf` + `_processed` -> `contacts_processed.vcf`, next to the input. */
export function deriveOutputPath(inputPath: string, suffix: string): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}${suffix}${ext}`);
}

export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, 'utf-8');
}

/** Write through a temp file and rename, so a failed run never leaves half a file. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}
