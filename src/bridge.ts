//
// The generate pipeline shared by every CLI command: settings -> bundler
// config -> Jest config -> stub files -> config file on disk.
//
import path from 'node:path';

import { loadBundlerConfig } from './bundler/config-loader';
import { buildJestConfig, renderJestConfig } from './jest/jest-config';
import {
  writeJestConfigFile,
  type WriteJestConfigResult,
} from './output/config-writer';
import {
  readBridgeSettings,
  resolveBridgeOptions,
  type BridgeSettings,
  type ResolvedBridgeSettings,
} from './settings';
import type { BuildJestConfigResult } from './shared-types';
import { writeStubFiles } from './stubs/stub-files';

export type GenerateResult = BuildJestConfigResult & {
  write: WriteJestConfigResult;
  stubsWritten: string[];
};

export const loadResolvedSettings = async (
  rootDir: string,
  overrides: BridgeSettings = {},
): Promise<ResolvedBridgeSettings> =>
  resolveBridgeOptions(rootDir, await readBridgeSettings(rootDir), overrides);

/** Builds the Jest config in memory without touching the filesystem output. */
export const buildFromSettings = async (
  settings: ResolvedBridgeSettings,
): Promise<BuildJestConfigResult> => {
  const bundlerConfig = await loadBundlerConfig(settings.configPath, {
    name: settings.configName,
  });
  return buildJestConfig(bundlerConfig, settings);
};

export const stubDirectoryFor = (settings: ResolvedBridgeSettings) =>
  path.resolve(settings.rootDir, settings.stubDir);

export const generate = async (
  settings: ResolvedBridgeSettings,
  { force = false }: { force?: boolean } = {},
): Promise<GenerateResult> => {
  const built = await buildFromSettings(settings);
  const stubsWritten = await writeStubFiles(
    stubDirectoryFor(settings),
    built.stubs,
  );
  const write = await writeJestConfigFile({
    filePath: settings.outFile,
    content: renderJestConfig(built.config, settings.format),
    cacheDir: settings.cacheDir,
    force,
  });
  return { ...built, write, stubsWritten };
};
