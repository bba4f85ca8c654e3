import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { getCountryCallingCode, isSupportedCountry, type CountryCode } from 'libphonenumber-js';
import type { TransformOptions } from './types/index.js';
import { ConfigError, errorMessage, logger } from './utils/index.js';

function isRegion(value: string): value is CountryCode {
  return isSupportedCountry(value);
}

const RegionSchema = z
  .string()
  .toUpperCase()
  .refine(isRegion, { message: 'Not a supported ISO 3166-1 region code' });

const ConfigSchema = z.object({
  /** Country whose calling code is stripped from numbers and used to classify them. */
  region: RegionSchema.default('PT'),
  lineEnding: z.enum(['auto', 'lf', 'crlf']).default('auto'),
  foldWidth: z.number().int().min(16).optional(),
  processedSuffix: z.string().min(1).default('_processed'),
  cleanedSuffix: z.string().min(1).default('_cleaned'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.vcf-tools', 'config.json');

/**
 * Load settings from `configPath`, `VCF_TOOLS_CONFIG` or the default
 * location. A missing default file means defaults; an explicitly named file
 * must exist. `VCF_TOOLS_REGION` overrides the region.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const explicit = configPath ?? process.env.VCF_TOOLS_CONFIG;
  const resolved = explicit ?? DEFAULT_CONFIG_PATH;

  let raw: unknown = {};
  const text = await readConfigFile(resolved, explicit !== undefined);
  if (text !== undefined) {
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(resolved, errorMessage(err));
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(resolved, formatIssues(parsed.error));

  const envRegion = process.env.VCF_TOOLS_REGION;
  if (!envRegion) return parsed.data;

  const region = RegionSchema.safeParse(envRegion);
  if (!region.success) throw new ConfigError('VCF_TOOLS_REGION', formatIssues(region.error));
  return { ...parsed.data, region: region.data };
}

export function transformOptionsFor(config: Pick<AppConfig, 'region'>): TransformOptions {
  return { callingCode: getCountryCallingCode(config.region) };
}

async function readConfigFile(configPath: string, required: boolean): Promise<string | undefined> {
  try {
    return await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (required || !isMissingFile(err)) throw new ConfigError(configPath, errorMessage(err));
    logger.debug('No config file at', configPath, '- using defaults');
    return undefined;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
