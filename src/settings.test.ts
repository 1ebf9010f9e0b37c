import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  parseBridgeSettings,
  readBridgeSettings,
  resolveBridgeOptions,
  SETTINGS_FILE_NAME,
} from './settings';

describe('parseBridgeSettings', () => {
  it('keeps known keys and ignores the rest', () => {
    expect(
      parseBridgeSettings(
        { outFile: 'jest.config.json', cssModules: 'proxy', comment: 'generated' },
        'settings',
      ),
    ).toEqual({ outFile: 'jest.config.json', cssModules: 'proxy' });
  });

  it('lists the accepted values of an invalid choice', () => {
    expect(() => parseBridgeSettings({ format: 'yaml' }, 'settings')).toThrow(
      'Invalid "format" in settings: expected js or json.',
    );
    expect(() => parseBridgeSettings({ cssModules: 'maybe' }, 'settings')).toThrow(
      'Invalid "cssModules" in settings: expected auto, proxy or stub.',
    );
  });

  it('rejects empty paths', () => {
    expect(() => parseBridgeSettings({ stubDir: '' }, 'settings')).toThrow(
      'Invalid "stubDir" in settings: expected a non-empty string.',
    );
  });

  it('rejects values that are not objects', () => {
    expect(() => parseBridgeSettings([], 'settings')).toThrow(
      'Settings in settings must be a JSON object.',
    );
  });
});

describe('readBridgeSettings', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'settings-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('treats a missing file as no settings', async () => {
    await expect(readBridgeSettings(workDir)).resolves.toEqual({});
  });

  it('reads the settings file', async () => {
    await fs.writeFile(
      path.join(workDir, SETTINGS_FILE_NAME),
      JSON.stringify({ assetStrategy: 'transform' }),
      'utf8',
    );

    await expect(readBridgeSettings(workDir)).resolves.toEqual({
      assetStrategy: 'transform',
    });
  });

  it('reports malformed JSON with the file path', async () => {
    const settingsPath = path.join(workDir, SETTINGS_FILE_NAME);
    await fs.writeFile(settingsPath, '{', 'utf8');

    await expect(readBridgeSettings(workDir)).rejects.toThrow(
      `Could not parse ${settingsPath}:`,
    );
  });
});

describe('resolveBridgeOptions', () => {
  it('fills in defaults', () => {
    expect(resolveBridgeOptions('/project', {})).toEqual({
      rootDir: '/project',
      configPath: '/project/webpack.config.js',
      outFile: '/project/jest.config.js',
      outDir: '/project',
      format: 'js',
      assetStrategy: 'mapper',
      cssModules: 'auto',
      stubDir: 'test/__mocks__',
      cacheDir: '/project/node_modules/.cache/jest-asset-bridge',
    });
  });

  it('lets overrides win over the settings file', () => {
    const resolved = resolveBridgeOptions(
      '/project',
      { outFile: 'config/jest.config.json', cssModules: 'proxy' },
      { cssModules: 'stub', configName: 'client' },
    );

    expect(resolved).toMatchObject({
      outFile: '/project/config/jest.config.json',
      outDir: '/project/config',
      format: 'json',
      cssModules: 'stub',
      configName: 'client',
    });
  });

  it('keeps an explicit format over the file extension', () => {
    expect(resolveBridgeOptions('/project', { format: 'json' }).format).toBe('json');
  });
});
