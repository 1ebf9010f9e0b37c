//
// Sorts bundler loader rules into the handful of categories the Jest side
// cares about: styles get stubbed or proxied, files get stubbed or
// transformed, scripts get a matching Jest transformer.
//
import type { BundlerRule, LoaderEntry } from '../shared-types';

export type RuleKind = 'style' | 'file' | 'script' | 'raw' | 'unknown';

const STYLE_LOADERS = new Set([
  'css-loader',
  'style-loader',
  'sass-loader',
  'less-loader',
  'stylus-loader',
  'postcss-loader',
  'mini-css-extract-plugin',
]);

const FILE_LOADERS = new Set([
  'file-loader',
  'url-loader',
  'svg-url-loader',
  'image-webpack-loader',
]);

const RAW_LOADERS = new Set(['raw-loader']);

/** Bundler loader -> Jest transformer with the same job. */
export const SCRIPT_TRANSFORMERS: Record<string, string> = {
  'babel-loader': 'babel-jest',
  'ts-loader': 'ts-jest',
  'swc-loader': '@swc/jest',
  'esbuild-loader': 'esbuild-jest',
};

const FILE_ASSET_TYPES = new Set(['asset', 'asset/resource', 'asset/inline']);

/**
 * Reduces a loader reference to its package name. Handles inline queries
 * ("css-loader?modules"), request chains ("style-loader!css-loader"), and
 * resolved paths ("/repo/node_modules/babel-loader/lib/index.js").
 */
export const normalizeLoaderName = (reference: string): string[] =>
  reference
    .split('!')
    .map((part) => part.split('?')[0].trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const posixPart = part.replace(/\\/g, '/');
      const nodeModulesIndex = posixPart.lastIndexOf('node_modules/');
      if (nodeModulesIndex === -1) {
        return posixPart;
      }
      const segments = posixPart
        .slice(nodeModulesIndex + 'node_modules/'.length)
        .split('/');
      return segments[0].startsWith('@') && segments.length > 1
        ? `${segments[0]}/${segments[1]}`
        : segments[0];
    });

const loaderEntries = (rule: BundlerRule): LoaderEntry[] => {
  const entries: LoaderEntry[] = [];
  if (rule.loader) {
    entries.push(
      rule.options ? { loader: rule.loader, options: rule.options } : rule.loader,
    );
  }
  if (rule.use !== undefined) {
    entries.push(...(Array.isArray(rule.use) ? rule.use : [rule.use]));
  }
  return entries;
};

/** Lists the bare loader package names a rule applies, in declaration order. */
export const listRuleLoaders = (rule: BundlerRule): string[] =>
  loaderEntries(rule).flatMap((entry) =>
    normalizeLoaderName(typeof entry === 'string' ? entry : entry.loader),
  );

export const classifyRule = (rule: BundlerRule): RuleKind => {
  if (rule.type !== undefined) {
    if (FILE_ASSET_TYPES.has(rule.type)) {
      return 'file';
    }
    if (rule.type === 'asset/source') {
      return 'raw';
    }
  }

  const loaders = listRuleLoaders(rule);
  // mini-css-extract-plugin's loader resolves to a path inside the plugin
  // package, so the package name is enough to recognize it.
  if (loaders.some((loader) => STYLE_LOADERS.has(loader))) {
    return 'style';
  }
  if (loaders.some((loader) => FILE_LOADERS.has(loader))) {
    return 'file';
  }
  if (loaders.some((loader) => RAW_LOADERS.has(loader))) {
    return 'raw';
  }
  if (loaders.some((loader) => loader in SCRIPT_TRANSFORMERS)) {
    return 'script';
  }
  return 'unknown';
};

/**
 * Expands `oneOf` and nested `rules` into a flat list in declaration order.
 * A parent rule without a loader of its own contributes only its children,
 * and children without a `test` inherit the parent's.
 */
export const flattenRules = (
  rules: BundlerRule[],
  inheritedTest?: BundlerRule['test'],
): BundlerRule[] =>
  rules.flatMap((rule) => {
    const withTest: BundlerRule =
      rule.test === undefined && inheritedTest !== undefined
        ? { ...rule, test: inheritedTest }
        : rule;
    const children = [...(rule.oneOf ?? []), ...(rule.rules ?? [])];
    const hasOwnBehavior =
      rule.loader !== undefined || rule.use !== undefined || rule.type !== undefined;
    const own = hasOwnBehavior ? [withTest] : [];
    return [...own, ...flattenRules(children, withTest.test)];
  });

/** True when any css-loader entry of the rule enables CSS modules. */
export const usesCssModules = (rule: BundlerRule): boolean =>
  loaderEntries(rule).some((entry) => {
    if (typeof entry === 'string') {
      return /(^|!)css-loader\?[^!]*modules/.test(entry);
    }
    return (
      normalizeLoaderName(entry.loader).includes('css-loader') &&
      Boolean(entry.options?.modules)
    );
  });
