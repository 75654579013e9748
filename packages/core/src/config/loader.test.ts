import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfigWithMeta } from './loader.js';
import { ConfigurationError } from '../errors.js';

let tempDir: string;

describe('loadConfigWithMeta', () => {
  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'glot-config-')));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('falls back to defaults when no config file exists', async () => {
    const result = await loadConfigWithMeta(undefined, { cwd: tempDir });

    expect(result.configPath).toBeNull();
    expect(result.projectRoot).toBe(tempDir);
    expect(result.config.primaryLocale).toBe('en');
  });

  it('finds the config file in a parent directory', async () => {
    await fs.writeFile(path.join(tempDir, '.glotrc.json'), JSON.stringify({ primaryLocale: 'de' }));
    const nested = path.join(tempDir, 'src', 'components');
    await fs.mkdir(nested, { recursive: true });

    const result = await loadConfigWithMeta(undefined, { cwd: nested });

    expect(result.configPath).toBe(path.join(tempDir, '.glotrc.json'));
    expect(result.projectRoot).toBe(tempDir);
    expect(result.config.primaryLocale).toBe('de');
  });

  it('requires an explicitly named file to exist', async () => {
    await expect(loadConfigWithMeta('custom.json', { cwd: tempDir })).rejects.toThrow(/Config file not found/);
  });

  it('reports invalid JSON as a configuration error', async () => {
    await fs.writeFile(path.join(tempDir, '.glotrc.json'), '{ "primaryLocale": ');

    await expect(loadConfigWithMeta(undefined, { cwd: tempDir })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('validates the loaded values', async () => {
    await fs.writeFile(path.join(tempDir, '.glotrc.json'), JSON.stringify({ replicaLocales: ['en'] }));

    await expect(loadConfigWithMeta(undefined, { cwd: tempDir })).rejects.toThrow(/must differ from primaryLocale/);
  });
});
