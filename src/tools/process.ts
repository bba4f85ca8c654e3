import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TRANSFORM_NAMES } from '../types/index.js';
import { TRANSFORMS } from '../transforms/index.js';
import { processDocument } from '../pipeline/index.js';
import { transformOptionsFor, type AppConfig } from '../config.js';
import { deriveOutputPath, NoOperationError, readTextFile, writeFileAtomic } from '../utils/index.js';
import { errorResult, jsonResult } from './result.js';

const operationHelp = TRANSFORM_NAMES.map(name => `${name}: ${TRANSFORMS[name].description}`).join('; ');

export function registerProcessTool(server: McpServer, config: AppConfig): void {
  server.registerTool('process_vcf', {
    description: 'Clean up a vCard (.vcf) file and write the result to a new file. Operations run in the order given.',
    inputSchema: {
      inputPath: z.string().describe('Path to the .vcf file to read'),
      outputPath: z.string().optional().describe(`Where to write the result (default: input path with "${config.processedSuffix}" suffix)`),
      operations: z.array(z.enum(TRANSFORM_NAMES)).optional().default([]).describe(`Operations to apply. ${operationHelp}`),
      sort: z.boolean().optional().default(false).describe('Sort contacts by name after the operations'),
    },
  }, async ({ inputPath, outputPath, operations, sort }) => {
    try {
      if (operations.length === 0 && !sort) {
        throw new NoOperationError(`At least one operation must be specified (${TRANSFORM_NAMES.join(', ')}) or sort enabled`);
      }

      const input = await readTextFile(inputPath);
      const result = processDocument(input, {
        operations,
        sort,
        transformOptions: transformOptionsFor(config),
        lineEnding: config.lineEnding,
        foldWidth: config.foldWidth,
      });

      const target = outputPath ?? deriveOutputPath(inputPath, config.processedSuffix);
      await writeFileAtomic(target, result.text);

      return jsonResult({
        records: result.records.length,
        applied: result.applied,
        sorted: result.sorted,
        outputPath: target,
        message: `Processed ${result.records.length} contacts into ${target}`,
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
