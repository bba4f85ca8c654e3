import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { contactNameKey, fieldIs, loadRecords } from '../vcard/index.js';
import { readTextFile } from '../utils/index.js';
import { errorResult, jsonResult } from './result.js';

export function registerListTool(server: McpServer): void {
  server.registerTool('list_vcf_contacts', {
    description: 'List the contacts in a vCard (.vcf) file with their 1-based index, name, phones and emails. Use the indices with delete_vcf_contacts.',
    inputSchema: {
      inputPath: z.string().describe('Path to the .vcf file to read'),
    },
  }, async ({ inputPath }) => {
    try {
      const records = loadRecords(await readTextFile(inputPath));
      return jsonResult(records.map((record, i) => ({
        index: i + 1,
        name: contactNameKey(record),
        phones: record.fields.filter(f => fieldIs(f, 'TEL')).map(f => f.value),
        emails: record.fields.filter(f => fieldIs(f, 'EMAIL')).map(f => f.value),
      })));
    } catch (err) {
      return errorResult(err);
    }
  });
}
