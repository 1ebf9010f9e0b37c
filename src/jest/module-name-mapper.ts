//
// Builds Jest's moduleNameMapper from bundler rules and aliases. Jest tries
// the entries in insertion order and stops at the first match, so asset
// entries go first: `@images/logo.png` must hit the file stub even though
// `@images` is also an alias.
//
import path from 'node:path';

import {
  classifyRule,
  flattenRules,
  usesCssModules,
} from '../bundler/rule-classifier';
import { conditionToPatterns } from '../bundler/test-pattern';
import type {
  AliasEntry,
  AliasTarget,
  BridgeOptions,
  BridgeWarning,
  BundlerAlias,
  BundlerConfig,
  BundlerRule,
  ModuleNameMapper,
  StubKind,
} from '../shared-types';
import { STUB_FILE_NAMES } from '../stubs/stub-files';
import { isInsideRoot, stubPath, toRootDirPath } from './root-dir';

export const CSS_MODULES_PROXY = 'identity-obj-proxy';

export type MapperEntry = {
  pattern: string;
  target: string | string[];
};

export type MapperBuild = {
  entries: MapperEntry[];
  warnings: BridgeWarning[];
  stubs: StubKind[];
};

type AssetMappingOptions = Pick<
  BridgeOptions,
  'assetStrategy' | 'cssModules' | 'stubDir'
>;

const addStub = (build: MapperBuild, kind: StubKind) => {
  if (!build.stubs.includes(kind)) {
    build.stubs.push(kind);
  }
};

const escapeRegExp = (value: string) =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// ---------------------------------------------------------------------------
// Asset rules
// ---------------------------------------------------------------------------

export const buildAssetMappings = (
  rules: BundlerRule[],
  options: AssetMappingOptions,
): MapperBuild => {
  const build: MapperBuild = { entries: [], warnings: [], stubs: [] };
  // CSS-modules entries go ahead of plain stubs so `x.module.css` is proxied
  // even when a broader `\.css$` rule comes first in the bundler config.
  const proxyEntries: MapperEntry[] = [];
  const stubEntries: MapperEntry[] = [];

  for (const rule of flattenRules(rules)) {
    const kind = classifyRule(rule);
    let target: string;
    let stub: StubKind | undefined;

    if (kind === 'style') {
      const proxy =
        options.cssModules === 'proxy' ||
        (options.cssModules === 'auto' && usesCssModules(rule));
      if (proxy) {
        target = CSS_MODULES_PROXY;
      } else {
        target = stubPath(options.stubDir, STUB_FILE_NAMES.style);
        stub = 'style';
      }
    } else if (kind === 'file' || kind === 'raw') {
      // Under the transform strategy these files go through fileTransformer.
      if (options.assetStrategy === 'transform') {
        continue;
      }
      target = stubPath(options.stubDir, STUB_FILE_NAMES.file);
      stub = 'file';
    } else {
      continue;
    }

    const { patterns, warnings } = conditionToPatterns(rule.test);
    build.warnings.push(...warnings);
    if (patterns.length === 0) {
      build.warnings.push({
        code: 'unsupported-condition',
        message: `A ${kind} rule has no \`test\` condition, so no mapping was generated for it.`,
      });
      continue;
    }
    if (stub) {
      addStub(build, stub);
    }
    const destination = stub ? stubEntries : proxyEntries;
    for (const pattern of patterns) {
      destination.push({ pattern, target });
    }
  }

  build.entries = [...proxyEntries, ...stubEntries];
  return build;
};

// ---------------------------------------------------------------------------
// Aliases
// ---------------------------------------------------------------------------

/** Normalizes both alias notations to entries; a trailing `$` means exact. */
export const normalizeAlias = (alias: BundlerAlias): AliasEntry[] => {
  if (Array.isArray(alias)) {
    return alias;
  }
  return Object.entries(alias).map(([key, target]) =>
    key.endsWith('$')
      ? { name: key.slice(0, -1), alias: target, onlyModule: true }
      : { name: key, alias: target },
  );
};

export const buildAliasMappings = (
  alias: BundlerAlias,
  rootDir: string,
  stubDir: string,
): MapperBuild => {
  const build: MapperBuild = { entries: [], warnings: [], stubs: [] };

  const convertTarget = (value: string) => {
    if (path.isAbsolute(value) || value.startsWith('./') || value.startsWith('../')) {
      const absolute = path.resolve(rootDir, value);
      const message = `Alias target ${absolute} is outside the project root and was kept as an absolute path.`;
      // Exact and subpath entries share a target; warn once.
      if (
        !isInsideRoot(absolute, rootDir) &&
        !build.warnings.some((warning) => warning.message === message)
      ) {
        build.warnings.push({ code: 'alias-outside-root', message });
      }
      return toRootDirPath(absolute, rootDir);
    }
    // Bare module names (e.g. "preact/compat") are valid mapper targets as is.
    return value.replace(/\/+$/, '');
  };

  const mapTarget = (target: AliasTarget, suffix: string): string | string[] => {
    if (target === false) {
      addStub(build, 'empty');
      return stubPath(stubDir, STUB_FILE_NAMES.empty);
    }
    if (Array.isArray(target)) {
      return target.map((item) => convertTarget(item) + suffix);
    }
    return convertTarget(target) + suffix;
  };

  // Longer names first so "@app/ui" is not swallowed by "@app".
  const entries = [...normalizeAlias(alias)].sort(
    (left, right) => right.name.length - left.name.length,
  );

  for (const entry of entries) {
    const escapedName = escapeRegExp(entry.name);
    build.entries.push({
      pattern: `^${escapedName}$`,
      target: mapTarget(entry.alias, ''),
    });
    if (entry.onlyModule) {
      continue;
    }
    build.entries.push({
      pattern: `^${escapedName}/(.*)$`,
      target: mapTarget(entry.alias, '/$1'),
    });
  }

  return build;
};

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export type ModuleNameMapperResult = {
  mapper: ModuleNameMapper;
  warnings: BridgeWarning[];
  stubs: StubKind[];
};

export const buildModuleNameMapper = (
  config: BundlerConfig,
  options: BridgeOptions,
): ModuleNameMapperResult => {
  const builds = [
    buildAssetMappings(config.module?.rules ?? [], options),
    buildAliasMappings(config.resolve?.alias ?? {}, options.rootDir, options.stubDir),
  ];

  const mapper: ModuleNameMapper = {};
  for (const { pattern, target } of builds.flatMap((build) => build.entries)) {
    if (!Object.hasOwn(mapper, pattern)) {
      mapper[pattern] = target;
    }
  }

  return {
    mapper,
    warnings: builds.flatMap((build) => build.warnings),
    stubs: [...new Set(builds.flatMap((build) => build.stubs))],
  };
};
