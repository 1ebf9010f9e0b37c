//
// Public API. The CLI is a thin layer over these; build tools that want the
// generated config in memory can call buildJestConfig directly.
//
export { generate, buildFromSettings, loadResolvedSettings } from './bridge';
export { loadBundlerConfig, parseBundlerConfig } from './bundler/config-loader';
export { classifyRule, listRuleLoaders, type RuleKind } from './bundler/rule-classifier';
export {
  buildJestConfig,
  buildModuleDirectories,
  buildModuleFileExtensions,
  renderJestConfig,
} from './jest/jest-config';
export { buildModuleNameMapper } from './jest/module-name-mapper';
export {
  applyModuleNameMapper,
  explainRequest,
  formatExplanation,
  type RequestExplanation,
} from './jest/resolution';
export { expandRootDir, toRootDirPath } from './jest/root-dir';
export { buildTransform } from './jest/transform';
export { createConfigWatcher } from './output/config-watcher';
export { writeJestConfigFile, type WriteJestConfigResult } from './output/config-writer';
export { resolveBridgeOptions, readBridgeSettings, type BridgeSettings } from './settings';
export { fileTransformer } from './stubs/file-transformer';
export { renderStubFiles, writeStubFiles } from './stubs/stub-files';
export type {
  BridgeOptions,
  BridgeWarning,
  BundlerConfig,
  BundlerRule,
  JestModuleConfig,
  ModuleNameMapper,
} from './shared-types';
