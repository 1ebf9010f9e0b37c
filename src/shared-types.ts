//
// Types shared by the bundler readers, the Jest config builders, and the CLI.
// The bundler side mirrors the subset of a webpack-style config that affects
// module resolution; the Jest side mirrors the keys we generate.
//

// ---------------------------------------------------------------------------
// Bundler configuration (input)
// ---------------------------------------------------------------------------

export type RuleCondition = RegExp | string | RuleCondition[];

export type LoaderEntry =
  | string
  | {
      loader: string;
      options?: Record<string, unknown>;
    };

export type BundlerRule = {
  test?: RuleCondition;
  include?: RuleCondition;
  exclude?: RuleCondition;
  loader?: string;
  options?: Record<string, unknown>;
  use?: LoaderEntry | LoaderEntry[];
  /** Asset module type, e.g. "asset/resource". */
  type?: string;
  oneOf?: BundlerRule[];
  rules?: BundlerRule[];
};

/** A single alias target. `false` makes the bundler resolve to an empty module. */
export type AliasTarget = string | string[] | false;

export type AliasEntry = {
  name: string;
  alias: AliasTarget;
  onlyModule?: boolean;
};

export type BundlerAlias = Record<string, AliasTarget> | AliasEntry[];

export type BundlerResolve = {
  alias?: BundlerAlias;
  extensions?: string[];
  modules?: string[];
};

export type BundlerConfig = {
  name?: string;
  target?: string | string[];
  resolve?: BundlerResolve;
  module?: {
    rules?: BundlerRule[];
  };
};

// ---------------------------------------------------------------------------
// Jest configuration (output)
// ---------------------------------------------------------------------------

/** Ordered pattern -> target pairs; the first matching pattern wins. */
export type ModuleNameMapper = Record<string, string | string[]>;

export type JestModuleConfig = {
  rootDir?: string;
  moduleNameMapper: ModuleNameMapper;
  transform?: Record<string, string>;
  moduleFileExtensions?: string[];
  moduleDirectories: string[];
  modulePaths?: string[];
  testEnvironment?: 'node' | 'jsdom';
};

// ---------------------------------------------------------------------------
// Bridge options and diagnostics
// ---------------------------------------------------------------------------

export type AssetStrategy = 'mapper' | 'transform';
export type CssModulesMode = 'auto' | 'proxy' | 'stub';
export type OutputFormat = 'js' | 'json';

export type StubKind = 'file' | 'style' | 'empty' | 'transformer';

export type BridgeOptions = {
  /** Absolute project root; the value `<rootDir>` stands for. */
  rootDir: string;
  assetStrategy: AssetStrategy;
  cssModules: CssModulesMode;
  /** Stub directory, relative to rootDir. */
  stubDir: string;
  format: OutputFormat;
  /** Directory the config file is written into; defaults to rootDir. */
  outDir?: string;
};

export type BridgeWarningCode =
  | 'lossy-regex-flags'
  | 'unknown-loader'
  | 'unsupported-condition'
  | 'alias-outside-root';

export type BridgeWarning = {
  code: BridgeWarningCode;
  message: string;
};

export type BuildJestConfigResult = {
  config: JestModuleConfig;
  warnings: BridgeWarning[];
  stubs: StubKind[];
};
