//
// Builds Jest's `transform` map. Script loaders get their Jest counterpart;
// under the transform asset strategy, file rules go through the generated
// fileTransformer instead of being mapped to a stub.
//
import {
  classifyRule,
  flattenRules,
  listRuleLoaders,
  SCRIPT_TRANSFORMERS,
  type RuleKind,
} from '../bundler/rule-classifier';
import { conditionToPatterns } from '../bundler/test-pattern';
import type {
  BridgeOptions,
  BridgeWarning,
  BundlerRule,
  StubKind,
} from '../shared-types';
import { STUB_FILE_NAMES } from '../stubs/stub-files';
import { stubPath } from './root-dir';

// Jest's own default, restored whenever a custom transform would drop it.
export const DEFAULT_SCRIPT_PATTERN = '\\.[jt]sx?$';
export const DEFAULT_SCRIPT_TRANSFORMER = 'babel-jest';

export type TransformBuild = {
  transform?: Record<string, string>;
  warnings: BridgeWarning[];
  stubs: StubKind[];
};

const matchesJavaScript = (pattern: string) => {
  try {
    return new RegExp(pattern).test('module.js');
  } catch {
    return false;
  }
};

export const buildTransform = (
  rules: BundlerRule[],
  options: Pick<BridgeOptions, 'assetStrategy' | 'stubDir'>,
): TransformBuild => {
  const transform: Record<string, string> = {};
  const warnings: BridgeWarning[] = [];
  const stubs: StubKind[] = [];

  const addEntries = (rule: BundlerRule, kind: RuleKind, transformer: string) => {
    const converted = conditionToPatterns(rule.test);
    warnings.push(...converted.warnings);
    if (converted.patterns.length === 0) {
      warnings.push({
        code: 'unsupported-condition',
        message: `A ${kind} rule has no \`test\` condition, so no transform entry was generated for it.`,
      });
      return false;
    }
    for (const pattern of converted.patterns) {
      if (!Object.hasOwn(transform, pattern)) {
        transform[pattern] = transformer;
      }
    }
    return true;
  };

  for (const rule of flattenRules(rules)) {
    const kind = classifyRule(rule);
    const loaders = listRuleLoaders(rule);

    if (kind === 'script') {
      const loader = loaders.find((name) => name in SCRIPT_TRANSFORMERS);
      if (loader) {
        addEntries(rule, kind, SCRIPT_TRANSFORMERS[loader]);
      }
    } else if ((kind === 'file' || kind === 'raw') && options.assetStrategy === 'transform') {
      const added = addEntries(
        rule,
        kind,
        stubPath(options.stubDir, STUB_FILE_NAMES.transformer),
      );
      if (added && !stubs.includes('transformer')) {
        stubs.push('transformer');
      }
    } else if (kind === 'unknown' && loaders.length > 0) {
      warnings.push({
        code: 'unknown-loader',
        message: `No Jest counterpart for ${loaders.join(', ')}; files it handles are loaded unchanged.`,
      });
    }
  }

  const patterns = Object.keys(transform);
  if (patterns.length === 0) {
    return { warnings, stubs };
  }
  if (!patterns.some(matchesJavaScript)) {
    transform[DEFAULT_SCRIPT_PATTERN] = DEFAULT_SCRIPT_TRANSFORMER;
  }
  return { transform, warnings, stubs };
};
