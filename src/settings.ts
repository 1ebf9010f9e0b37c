//
// Bridge settings come from three layers: built-in defaults, an optional
// `.jest-bridge.json` at the project root, and CLI flags. Later layers win.
//
import path from 'node:path';

import { readTextFileIfExists } from './fs-utils';
import type {
  AssetStrategy,
  BridgeOptions,
  CssModulesMode,
  OutputFormat,
} from './shared-types';

export const SETTINGS_FILE_NAME = '.jest-bridge.json';

export type BridgeSettings = {
  configPath?: string;
  configName?: string;
  outFile?: string;
  format?: OutputFormat;
  assetStrategy?: AssetStrategy;
  cssModules?: CssModulesMode;
  stubDir?: string;
  cacheDir?: string;
};

export type ResolvedBridgeSettings = BridgeOptions & {
  /** Absolute path of the bundler config. */
  configPath: string;
  configName?: string;
  /** Absolute path of the generated Jest config. */
  outFile: string;
  /** Absolute cache directory for merge snapshots. */
  cacheDir: string;
};

export const DEFAULT_SETTINGS = {
  configPath: 'webpack.config.js',
  outFile: 'jest.config.js',
  assetStrategy: 'mapper',
  cssModules: 'auto',
  stubDir: 'test/__mocks__',
  cacheDir: 'node_modules/.cache/jest-asset-bridge',
} as const satisfies BridgeSettings;

const ASSET_STRATEGIES: readonly AssetStrategy[] = ['mapper', 'transform'];
const CSS_MODULES_MODES: readonly CssModulesMode[] = ['auto', 'proxy', 'stub'];
const OUTPUT_FORMATS: readonly OutputFormat[] = ['js', 'json'];

const isOneOf = <T extends string>(
  allowed: readonly T[],
  value: unknown,
): value is T => allowed.some((candidate) => candidate === value);

const describeChoices = (choices: readonly string[]) =>
  choices.length > 1
    ? `${choices.slice(0, -1).join(', ')} or ${choices[choices.length - 1]}`
    : choices.join('');

const STRING_KEYS = [
  'configPath',
  'configName',
  'outFile',
  'stubDir',
  'cacheDir',
] as const;

/**
 * Validates raw settings. Unknown keys are ignored so settings files can carry
 * notes or keys from newer versions.
 */
export const parseBridgeSettings = (
  value: unknown,
  source: string,
): BridgeSettings => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Settings in ${source} must be a JSON object.`);
  }

  const settings: BridgeSettings = {};
  const raw = new Map(Object.entries(value));
  const fail = (key: string, expected: string) =>
    new Error(`Invalid "${key}" in ${source}: expected ${expected}.`);

  for (const key of STRING_KEYS) {
    const entry = raw.get(key);
    if (entry === undefined) {
      continue;
    }
    if (typeof entry !== 'string' || entry.length === 0) {
      throw fail(key, 'a non-empty string');
    }
    settings[key] = entry;
  }

  const format = raw.get('format');
  if (format !== undefined) {
    if (!isOneOf(OUTPUT_FORMATS, format)) {
      throw fail('format', describeChoices(OUTPUT_FORMATS));
    }
    settings.format = format;
  }

  const assetStrategy = raw.get('assetStrategy');
  if (assetStrategy !== undefined) {
    if (!isOneOf(ASSET_STRATEGIES, assetStrategy)) {
      throw fail('assetStrategy', describeChoices(ASSET_STRATEGIES));
    }
    settings.assetStrategy = assetStrategy;
  }

  const cssModules = raw.get('cssModules');
  if (cssModules !== undefined) {
    if (!isOneOf(CSS_MODULES_MODES, cssModules)) {
      throw fail('cssModules', describeChoices(CSS_MODULES_MODES));
    }
    settings.cssModules = cssModules;
  }

  return settings;
};

/** Reads `.jest-bridge.json` from rootDir; a missing file means no overrides. */
export const readBridgeSettings = async (
  rootDir: string,
): Promise<BridgeSettings> => {
  const settingsPath = path.join(rootDir, SETTINGS_FILE_NAME);
  const raw = await readTextFileIfExists(settingsPath);
  if (raw === null) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not parse ${settingsPath}: ${reason}`);
  }
  return parseBridgeSettings(parsed, settingsPath);
};

const formatFromFileName = (fileName: string): OutputFormat =>
  path.extname(fileName) === '.json' ? 'json' : 'js';

/** Layers defaults, the settings file, and CLI overrides into final options. */
export const resolveBridgeOptions = (
  rootDir: string,
  settings: BridgeSettings,
  overrides: BridgeSettings = {},
): ResolvedBridgeSettings => {
  const merged = { ...DEFAULT_SETTINGS, ...settings, ...overrides };
  const absoluteRoot = path.resolve(rootDir);
  const outFile = path.resolve(absoluteRoot, merged.outFile);

  return {
    rootDir: absoluteRoot,
    configPath: path.resolve(absoluteRoot, merged.configPath),
    ...(merged.configName ? { configName: merged.configName } : {}),
    outFile,
    outDir: path.dirname(outFile),
    format: merged.format ?? formatFromFileName(outFile),
    assetStrategy: merged.assetStrategy,
    cssModules: merged.cssModules,
    stubDir: merged.stubDir,
    cacheDir: path.resolve(absoluteRoot, merged.cacheDir),
  };
};
