//
// Replays how Jest would treat an import request under a generated config.
// This mirrors the moduleNameMapper lookup rules (first match wins, `$n`
// substitution, `<rootDir>` expansion) without resolving anything on disk.
//
import path from 'node:path';

import type { JestModuleConfig, ModuleNameMapper } from '../shared-types';
import { STUB_FILE_NAMES } from '../stubs/stub-files';
import { CSS_MODULES_PROXY } from './module-name-mapper';
import { expandRootDir } from './root-dir';

export type MapperMatch = {
  pattern: string;
  /** Substituted, rootDir-expanded targets; Jest uses the first that exists. */
  candidates: string[];
};

export type MappingKind =
  | 'file-stub'
  | 'style-stub'
  | 'style-proxy'
  | 'empty-module'
  | 'alias';

export type RequestExplanation =
  | ({ kind: 'mapped'; via: MappingKind } & MapperMatch)
  | { kind: 'transformed'; pattern: string; transformer: string }
  | { kind: 'unchanged' };

const compilePattern = (pattern: string, key: string) => {
  try {
    return new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid ${key} pattern "${pattern}": ${reason}`);
  }
};

export const applyModuleNameMapper = (
  request: string,
  mapper: ModuleNameMapper,
  rootDir: string,
): MapperMatch | null => {
  for (const [pattern, target] of Object.entries(mapper)) {
    const match = compilePattern(pattern, 'moduleNameMapper').exec(request);
    if (!match) {
      continue;
    }

    const targets = Array.isArray(target) ? target : [target];
    const candidates = targets.map((candidate) =>
      expandRootDir(
        candidate.replace(
          /\$(\d+)/g,
          (_placeholder, index: string) => match[Number(index)] ?? '',
        ),
        rootDir,
      ),
    );
    return { pattern, candidates };
  }
  return null;
};

const mappingKindFor = (target: string | string[]): MappingKind => {
  if (Array.isArray(target)) {
    return 'alias';
  }
  if (target === CSS_MODULES_PROXY) {
    return 'style-proxy';
  }
  switch (path.posix.basename(target)) {
    case STUB_FILE_NAMES.file:
      return 'file-stub';
    case STUB_FILE_NAMES.style:
      return 'style-stub';
    case STUB_FILE_NAMES.empty:
      return 'empty-module';
    default:
      return 'alias';
  }
};

export const explainRequest = (
  request: string,
  config: JestModuleConfig,
  rootDir: string,
): RequestExplanation => {
  const mapped = applyModuleNameMapper(request, config.moduleNameMapper, rootDir);
  if (mapped) {
    return {
      kind: 'mapped',
      via: mappingKindFor(config.moduleNameMapper[mapped.pattern]),
      ...mapped,
    };
  }

  for (const [pattern, transformer] of Object.entries(config.transform ?? {})) {
    if (compilePattern(pattern, 'transform').test(request)) {
      return {
        kind: 'transformed',
        pattern,
        transformer: expandRootDir(transformer, rootDir),
      };
    }
  }

  return { kind: 'unchanged' };
};

const MAPPING_LABELS: Record<MappingKind, string> = {
  'file-stub': 'file stub',
  'style-stub': 'style stub',
  'style-proxy': 'CSS modules proxy',
  'empty-module': 'empty module',
  alias: 'alias',
};

/** One human-readable line per request, used by `explain`. */
export const formatExplanation = (
  request: string,
  explanation: RequestExplanation,
) => {
  switch (explanation.kind) {
    case 'mapped':
      return `${request} -> ${explanation.candidates.join(' | ')} (${MAPPING_LABELS[explanation.via]}, matched ${explanation.pattern})`;
    case 'transformed':
      return `${request} -> transformed by ${explanation.transformer} (matched ${explanation.pattern})`;
    case 'unchanged':
      return `${request} -> resolved normally`;
  }
};
