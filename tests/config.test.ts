import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { loadConfig, transformOptionsFor } from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';
import { createTempDir } from './helpers.js';

let tmp: { dir: string; cleanup: () => Promise<void> };

async function writeConfig(content: string, name = 'config.json'): Promise<string> {
  const configPath = path.join(tmp.dir, name);
  await fs.writeFile(configPath, content, 'utf-8');
  return configPath;
}

beforeEach(async () => {
  tmp = await createTempDir();
  vi.stubEnv('VCF_TOOLS_REGION', '');
});

afterEach(async () => {
  vi.unstubAllEnvs();
  await tmp.cleanup();
});

describe('loadConfig', () => {
  it('should fill in defaults', async () => {
    const config = await loadConfig(await writeConfig('{}'));
    expect(config).toEqual({
      region: 'PT',
      lineEnding: 'auto',
      processedSuffix: '_processed',
      cleanedSuffix: '_cleaned',
    });
  });

  it('should read every setting', async () => {
    const config = await loadConfig(await writeConfig(JSON.stringify({
      region: 'es',
      lineEnding: 'crlf',
      foldWidth: 75,
      processedSuffix: '.out',
      cleanedSuffix: '.kept',
    })));
    expect(config).toEqual({
      region: 'ES',
      lineEnding: 'crlf',
      foldWidth: 75,
      processedSuffix: '.out',
      cleanedSuffix: '.kept',
    });
  });

  it('should reject an unknown region', async () => {
    const configPath = await writeConfig('{"region":"XX"}');
    await expect(loadConfig(configPath)).rejects.toThrow(
      `Invalid config ${configPath}: region: Not a supported ISO 3166-1 region code`,
    );
  });

  it('should reject a fold width below 16', async () => {
    await expect(loadConfig(await writeConfig('{"foldWidth":8}'))).rejects.toThrow(ConfigError);
  });

  it('should reject invalid JSON', async () => {
    await expect(loadConfig(await writeConfig('{region:'))).rejects.toThrow(ConfigError);
  });

  it('should require a config file that was named explicitly', async () => {
    await expect(loadConfig(path.join(tmp.dir, 'missing.json'))).rejects.toThrow(ConfigError);
  });

  it('should take the path from VCF_TOOLS_CONFIG', async () => {
    vi.stubEnv('VCF_TOOLS_CONFIG', await writeConfig('{"lineEnding":"lf"}', 'env.json'));
    expect((await loadConfig()).lineEnding).toBe('lf');
  });

  it('should let VCF_TOOLS_REGION override the file', async () => {
    vi.stubEnv('VCF_TOOLS_REGION', 'br');
    expect((await loadConfig(await writeConfig('{"region":"ES"}'))).region).toBe('BR');
  });

  it('should validate VCF_TOOLS_REGION', async () => {
    vi.stubEnv('VCF_TOOLS_REGION', 'nowhere');
    await expect(loadConfig(await writeConfig('{}'))).rejects.toThrow('Invalid config VCF_TOOLS_REGION:');
  });
});

describe('transformOptionsFor', () => {
  it('should map the region to its calling code', () => {
    expect(transformOptionsFor({ region: 'PT' })).toEqual({ callingCode: '351' });
    expect(transformOptionsFor({ region: 'ES' })).toEqual({ callingCode: '34' });
  });
});
