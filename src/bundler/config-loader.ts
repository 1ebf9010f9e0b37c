//
// Loads a webpack-style bundler config from disk and narrows it to the subset
// that affects module resolution. Everything coming out of a user's config is
// `unknown` until a guard below has checked it.
//
import { promises as fs } from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';

import { canReadFile } from '../fs-utils';
import type {
  AliasEntry,
  AliasTarget,
  BundlerAlias,
  BundlerConfig,
  BundlerResolve,
  BundlerRule,
  LoaderEntry,
  RuleCondition,
} from '../shared-types';

export type LoadBundlerConfigOptions = {
  /** Picks the entry with this `name` when the config exports an array. */
  name?: string;
  /** Passed as the first argument when the config exports a function. */
  env?: Record<string, unknown>;
};

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof RegExp);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const invalid = (keyPath: string, expected: string) =>
  new Error(`Invalid bundler config at ${keyPath}: expected ${expected}.`);

const parseCondition = (value: unknown, keyPath: string): RuleCondition => {
  if (value instanceof RegExp || typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) =>
      parseCondition(item, `${keyPath}[${index}]`),
    );
  }
  throw invalid(keyPath, 'a RegExp, a string, or an array of them');
};

const parseOptions = (
  value: unknown,
  keyPath: string,
): Record<string, unknown> | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw invalid(keyPath, 'an object');
  }
  return value;
};

const parseLoaderEntry = (value: unknown, keyPath: string): LoaderEntry => {
  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value) && typeof value.loader === 'string') {
    const options = parseOptions(value.options, `${keyPath}.options`);
    return options ? { loader: value.loader, options } : { loader: value.loader };
  }
  throw invalid(keyPath, 'a loader name or { loader, options }');
};

const parseRules = (value: unknown, keyPath: string): BundlerRule[] => {
  if (!Array.isArray(value)) {
    throw invalid(keyPath, 'an array of rules');
  }
  return value.map((item, index) => parseRule(item, `${keyPath}[${index}]`));
};

const parseRule = (value: unknown, keyPath: string): BundlerRule => {
  if (!isRecord(value)) {
    throw invalid(keyPath, 'a rule object');
  }

  const rule: BundlerRule = {};
  if (value.test !== undefined) {
    rule.test = parseCondition(value.test, `${keyPath}.test`);
  }
  if (value.include !== undefined) {
    rule.include = parseCondition(value.include, `${keyPath}.include`);
  }
  if (value.exclude !== undefined) {
    rule.exclude = parseCondition(value.exclude, `${keyPath}.exclude`);
  }
  if (value.loader !== undefined) {
    if (typeof value.loader !== 'string') {
      throw invalid(`${keyPath}.loader`, 'a string');
    }
    rule.loader = value.loader;
  }
  const options = parseOptions(value.options, `${keyPath}.options`);
  if (options) {
    rule.options = options;
  }
  if (value.use !== undefined) {
    rule.use = Array.isArray(value.use)
      ? value.use.map((item, index) =>
          parseLoaderEntry(item, `${keyPath}.use[${index}]`),
        )
      : parseLoaderEntry(value.use, `${keyPath}.use`);
  }
  if (value.type !== undefined) {
    if (typeof value.type !== 'string') {
      throw invalid(`${keyPath}.type`, 'a string');
    }
    rule.type = value.type;
  }
  if (value.oneOf !== undefined) {
    rule.oneOf = parseRules(value.oneOf, `${keyPath}.oneOf`);
  }
  if (value.rules !== undefined) {
    rule.rules = parseRules(value.rules, `${keyPath}.rules`);
  }
  return rule;
};

const parseAliasTarget = (value: unknown, keyPath: string): AliasTarget => {
  if (value === false || typeof value === 'string' || isStringArray(value)) {
    return value;
  }
  throw invalid(keyPath, 'a path, an array of paths, or false');
};

const parseAlias = (value: unknown, keyPath: string): BundlerAlias => {
  if (Array.isArray(value)) {
    return value.map((item, index): AliasEntry => {
      const entryPath = `${keyPath}[${index}]`;
      if (!isRecord(item) || typeof item.name !== 'string') {
        throw invalid(entryPath, '{ name, alias, onlyModule? }');
      }
      const entry: AliasEntry = {
        name: item.name,
        alias: parseAliasTarget(item.alias, `${entryPath}.alias`),
      };
      if (item.onlyModule !== undefined) {
        if (typeof item.onlyModule !== 'boolean') {
          throw invalid(`${entryPath}.onlyModule`, 'a boolean');
        }
        entry.onlyModule = item.onlyModule;
      }
      return entry;
    });
  }

  if (!isRecord(value)) {
    throw invalid(keyPath, 'an object or an array of alias entries');
  }
  const alias: Record<string, AliasTarget> = {};
  for (const [key, target] of Object.entries(value)) {
    alias[key] = parseAliasTarget(target, `${keyPath}.${key}`);
  }
  return alias;
};

const parseResolve = (value: unknown, keyPath: string): BundlerResolve => {
  if (!isRecord(value)) {
    throw invalid(keyPath, 'an object');
  }
  const resolve: BundlerResolve = {};
  if (value.alias !== undefined) {
    resolve.alias = parseAlias(value.alias, `${keyPath}.alias`);
  }
  if (value.extensions !== undefined) {
    if (!isStringArray(value.extensions)) {
      throw invalid(`${keyPath}.extensions`, 'an array of strings');
    }
    resolve.extensions = value.extensions;
  }
  if (value.modules !== undefined) {
    if (!isStringArray(value.modules)) {
      throw invalid(`${keyPath}.modules`, 'an array of strings');
    }
    resolve.modules = value.modules;
  }
  return resolve;
};

/**
 * Validates a raw config value. Unknown keys are dropped; known keys with the
 * wrong type throw an error naming the offending key path.
 */
export const parseBundlerConfig = (
  value: unknown,
  source: string,
): BundlerConfig => {
  if (!isRecord(value)) {
    throw new Error(`Bundler config in ${source} must export an object.`);
  }

  const config: BundlerConfig = {};
  if (typeof value.name === 'string') {
    config.name = value.name;
  }
  if (value.target !== undefined) {
    if (typeof value.target !== 'string' && !isStringArray(value.target)) {
      throw invalid('target', 'a string or an array of strings');
    }
    config.target = value.target;
  }
  if (value.resolve !== undefined) {
    config.resolve = parseResolve(value.resolve, 'resolve');
  }
  if (value.module !== undefined) {
    if (!isRecord(value.module)) {
      throw invalid('module', 'an object');
    }
    config.module =
      value.module.rules === undefined
        ? {}
        : { rules: parseRules(value.module.rules, 'module.rules') };
  }
  return config;
};

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

// Configs are re-read in watch mode, so the require cache entry is dropped
// before every load.
const requireFresh = (absolutePath: string): unknown => {
  const requireFromConfig = createRequire(absolutePath);
  const resolvedPath = requireFromConfig.resolve(absolutePath);
  delete requireFromConfig.cache[resolvedPath];
  const exported: unknown = requireFromConfig(resolvedPath);
  if (isRecord(exported) && exported.__esModule === true && 'default' in exported) {
    return exported.default;
  }
  return exported;
};

const readConfigExport = async (absolutePath: string): Promise<unknown> => {
  const extension = path.extname(absolutePath);
  if (extension === '.mjs') {
    throw new Error(
      `ES module bundler configs are not supported: ${absolutePath}. Export the config with module.exports instead.`,
    );
  }

  if (extension !== '.json') {
    return requireFresh(absolutePath);
  }

  const raw = await fs.readFile(absolutePath, 'utf8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not parse ${absolutePath}: ${reason}`);
  }
};

const selectConfig = (
  exported: unknown,
  name: string | undefined,
  source: string,
): unknown => {
  if (!Array.isArray(exported)) {
    return exported;
  }
  if (exported.length === 0) {
    throw new Error(`Bundler config in ${source} exports an empty array.`);
  }
  if (name === undefined) {
    return exported[0];
  }

  const match = exported.find(
    (candidate) => isRecord(candidate) && candidate.name === name,
  );
  if (match === undefined) {
    throw new Error(`No bundler config named "${name}" in ${source}.`);
  }
  return match;
};

/** Reads, evaluates, and validates the bundler config at `configPath`. */
export const loadBundlerConfig = async (
  configPath: string,
  options: LoadBundlerConfigOptions = {},
): Promise<BundlerConfig> => {
  const absolutePath = path.resolve(configPath);
  if (!(await canReadFile(absolutePath))) {
    throw new Error(`Bundler config not found: ${absolutePath}`);
  }

  const evaluate = async (value: unknown): Promise<unknown> => {
    if (typeof value !== 'function') {
      return value;
    }
    const produced: unknown = value(options.env ?? {}, { mode: 'development' });
    return await produced;
  };

  // Function exports may return an array, and arrays may hold functions.
  let exported = await evaluate(await readConfigExport(absolutePath));
  if (Array.isArray(exported)) {
    exported = await Promise.all(exported.map(evaluate));
  }

  return parseBundlerConfig(
    selectConfig(exported, options.name, absolutePath),
    absolutePath,
  );
};
