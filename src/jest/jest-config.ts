//
// Composes the Jest module-resolution config from a bundler config and
// renders it to the text that lands in jest.config.js / jest.config.json.
//
import path from 'node:path';

import type {
  BridgeOptions,
  BuildJestConfigResult,
  BundlerConfig,
  JestModuleConfig,
  OutputFormat,
  StubKind,
} from '../shared-types';
import { buildModuleNameMapper } from './module-name-mapper';
import { toRootDirPath } from './root-dir';
import { buildTransform } from './transform';

// What the bundler means by "..." in resolve.extensions.
const BUNDLER_DEFAULT_EXTENSIONS = ['js', 'json', 'wasm'];

/**
 * Converts resolve.extensions to moduleFileExtensions. Returns undefined when
 * nothing is configured so Jest keeps its own defaults.
 */
export const buildModuleFileExtensions = (
  extensions: string[] | undefined,
): string[] | undefined => {
  if (!extensions || extensions.length === 0) {
    return undefined;
  }

  const result: string[] = [];
  const add = (extension: string) => {
    const bare = extension.replace(/^\./, '');
    if (bare.length > 0 && !result.includes(bare)) {
      result.push(bare);
    }
  };

  for (const extension of extensions) {
    if (extension === '...') {
      BUNDLER_DEFAULT_EXTENSIONS.forEach(add);
    } else {
      add(extension);
    }
  }

  // Jest refuses to start without "js" in the list.
  add('js');
  return result;
};

export type ModuleDirectoriesResult = {
  moduleDirectories: string[];
  modulePaths?: string[];
};

/**
 * Bare names in resolve.modules are searched up the tree like node_modules;
 * absolute paths are fixed search roots, which is what modulePaths means.
 */
export const buildModuleDirectories = (
  modules: string[] | undefined,
  rootDir: string,
): ModuleDirectoriesResult => {
  const moduleDirectories: string[] = [];
  const modulePaths: string[] = [];

  for (const entry of modules ?? []) {
    if (path.isAbsolute(entry)) {
      const rootDirPath = toRootDirPath(entry, rootDir);
      if (!modulePaths.includes(rootDirPath)) {
        modulePaths.push(rootDirPath);
      }
    } else if (!moduleDirectories.includes(entry)) {
      moduleDirectories.push(entry);
    }
  }

  if (!moduleDirectories.includes('node_modules')) {
    moduleDirectories.push('node_modules');
  }

  return modulePaths.length > 0
    ? { moduleDirectories, modulePaths }
    : { moduleDirectories };
};

export const resolveTestEnvironment = (
  target: BundlerConfig['target'],
): JestModuleConfig['testEnvironment'] => {
  const first = Array.isArray(target) ? target[0] : target;
  if (first === undefined) {
    return undefined;
  }
  if (/^(async-)?node/.test(first) || first === 'electron-main') {
    return 'node';
  }
  if (
    first === 'web' ||
    first === 'webworker' ||
    first === 'electron-renderer' ||
    first.startsWith('browserslist')
  ) {
    return 'jsdom';
  }
  return undefined;
};

const relativeRootDir = (options: BridgeOptions) => {
  const relative = path
    .relative(options.outDir ?? options.rootDir, options.rootDir)
    .split(path.sep)
    .join('/');
  return relative === '' ? '.' : relative;
};

export const buildJestConfig = (
  bundlerConfig: BundlerConfig,
  options: BridgeOptions,
): BuildJestConfigResult => {
  const mapper = buildModuleNameMapper(bundlerConfig, options);
  const transform = buildTransform(bundlerConfig.module?.rules ?? [], options);
  const directories = buildModuleDirectories(
    bundlerConfig.resolve?.modules,
    options.rootDir,
  );
  const moduleFileExtensions = buildModuleFileExtensions(
    bundlerConfig.resolve?.extensions,
  );
  const testEnvironment = resolveTestEnvironment(bundlerConfig.target);

  // Key order here is the order in the rendered file.
  const config: JestModuleConfig = {
    rootDir: relativeRootDir(options),
    ...(testEnvironment ? { testEnvironment } : {}),
    ...(moduleFileExtensions ? { moduleFileExtensions } : {}),
    moduleDirectories: directories.moduleDirectories,
    ...(directories.modulePaths ? { modulePaths: directories.modulePaths } : {}),
    moduleNameMapper: mapper.mapper,
    ...(transform.transform ? { transform: transform.transform } : {}),
  };

  const stubs: StubKind[] = [...new Set([...mapper.stubs, ...transform.stubs])];
  return {
    config,
    warnings: [...mapper.warnings, ...transform.warnings],
    stubs,
  };
};

const GENERATED_HEADER = [
  '// Generated by jest-asset-bridge from the bundler config.',
  '// Local edits survive regeneration unless they touch generated lines.',
].join('\n');

/** Deterministic text with one entry per line so line merges stay precise. */
export const renderJestConfig = (
  config: JestModuleConfig,
  format: OutputFormat,
): string => {
  const body = JSON.stringify(config, null, 2);
  if (format === 'json') {
    return `${body}\n`;
  }
  return `${GENERATED_HEADER}\nmodule.exports = ${body};\n`;
};
