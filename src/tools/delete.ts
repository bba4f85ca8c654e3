import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { pruneDocument } from '../pipeline/index.js';
import { contactNameKey } from '../vcard/index.js';
import type { AppConfig } from '../config.js';
import { deriveOutputPath, readTextFile, writeFileAtomic } from '../utils/index.js';
import { errorResult, jsonResult } from './result.js';

export function registerDeleteTool(server: McpServer, config: AppConfig): void {
  server.registerTool('delete_vcf_contacts', {
    description: 'Delete contacts from a vCard (.vcf) file by their 1-based index (see list_vcf_contacts) and write the remaining contacts to a new file.',
    inputSchema: {
      inputPath: z.string().describe('Path to the .vcf file to read'),
      outputPath: z.string().optional().describe(`Where to write the kept contacts (default: input path with "${config.cleanedSuffix}" suffix)`),
      indices: z.array(z.number().int().positive()).describe('1-based indices of the contacts to delete'),
    },
  }, async ({ inputPath, outputPath, indices }) => {
    try {
      const toDelete = new Set(indices);
      const result = pruneDocument(await readTextFile(inputPath), index => toDelete.has(index), {
        lineEnding: config.lineEnding,
        foldWidth: config.foldWidth,
      });

      const target = outputPath ?? deriveOutputPath(inputPath, config.cleanedSuffix);
      await writeFileAtomic(target, result.text);

      return jsonResult({
        kept: result.kept.length,
        deleted: result.deleted.length,
        deletedNames: result.deleted.map(contactNameKey),
        outputPath: target,
        message: `Deleted ${result.deleted.length} of ${result.kept.length + result.deleted.length} contacts, saved to ${target}`,
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
