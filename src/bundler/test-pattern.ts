//
// Converts bundler rule conditions into the regex source strings Jest uses
// as moduleNameMapper and transform keys.
//
import type { BridgeWarning, RuleCondition } from '../shared-types';

// Flags that do not change which strings match.
const HARMLESS_FLAGS = new Set(['g', 'y', 'u']);

export type ConditionPatterns = {
  patterns: string[];
  warnings: BridgeWarning[];
};

/**
 * Flattens a rule `test` into regex sources. Strings are taken as regex
 * source because JSON configs cannot hold RegExp values.
 */
export const conditionToPatterns = (
  condition: RuleCondition | undefined,
): ConditionPatterns => {
  if (condition === undefined) {
    return { patterns: [], warnings: [] };
  }

  if (Array.isArray(condition)) {
    const parts = condition.map(conditionToPatterns);
    return {
      patterns: parts.flatMap((part) => part.patterns),
      warnings: parts.flatMap((part) => part.warnings),
    };
  }

  if (typeof condition === 'string') {
    return { patterns: [condition], warnings: [] };
  }

  const lossyFlags = [...condition.flags].filter(
    (flag) => !HARMLESS_FLAGS.has(flag),
  );
  const warnings: BridgeWarning[] =
    lossyFlags.length > 0
      ? [
          {
            code: 'lossy-regex-flags',
            message: `Jest patterns cannot carry RegExp flags; dropped "${lossyFlags.join('')}" from /${condition.source}/.`,
          },
        ]
      : [];
  return { patterns: [condition.source], warnings };
};
