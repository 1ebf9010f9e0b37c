//
// Command-line front end. parseCliArgs is pure; runCli does the I/O.
//
import path from 'node:path';
import { parseArgs } from 'node:util';

import {
  buildFromSettings,
  generate,
  loadResolvedSettings,
  stubDirectoryFor,
} from './bridge';
import { explainRequest, formatExplanation } from './jest/resolution';
import { createConfigWatcher, type WatchFactory } from './output/config-watcher';
import type { WriteJestConfigResult } from './output/config-writer';
import {
  parseBridgeSettings,
  SETTINGS_FILE_NAME,
  type BridgeSettings,
  type ResolvedBridgeSettings,
} from './settings';
import type { BridgeWarning } from './shared-types';
import { writeStubFiles } from './stubs/stub-files';

const PROGRAM_NAME = 'jest-asset-bridge';

export const COMMANDS = ['generate', 'explain', 'stubs'] as const;
export type CliCommand = (typeof COMMANDS)[number];

export type ParsedCliArgs =
  | {
      ok: true;
      command: CliCommand;
      rootDir: string;
      overrides: BridgeSettings;
      requests: string[];
      force: boolean;
      watch: boolean;
      help: boolean;
    }
  | { ok: false; errorMessage: string };

export const USAGE = `Usage: ${PROGRAM_NAME} [generate|explain|stubs] [options]

Commands:
  generate             Write the Jest config and stub files (default)
  explain <request>... Show how Jest would treat each import request
  stubs                Write only the stub files

Options:
  -c, --config <path>        Bundler config (default: webpack.config.js)
      --name <name>          Entry to use when the config exports an array
      --root <dir>           Project root, the value of <rootDir> (default: cwd)
  -o, --out <path>           Jest config to write (default: jest.config.js)
      --format <js|json>     Output format (default: from --out extension)
      --asset-strategy <mapper|transform>
      --css-modules <auto|proxy|stub>
      --stub-dir <dir>       Stub directory under the root (default: test/__mocks__)
      --force                Overwrite a Jest config this tool did not write
  -w, --watch                Regenerate when the bundler config changes
  -h, --help                 Show this help`;

const isCommand = (value: string): value is CliCommand =>
  COMMANDS.some((command) => command === value);

const parseRawArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: 'string', short: 'c' },
      name: { type: 'string' },
      root: { type: 'string' },
      out: { type: 'string', short: 'o' },
      format: { type: 'string' },
      'asset-strategy': { type: 'string' },
      'css-modules': { type: 'string' },
      'stub-dir': { type: 'string' },
      force: { type: 'boolean' },
      watch: { type: 'boolean', short: 'w' },
      help: { type: 'boolean', short: 'h' },
    },
  });

export const parseCliArgs = (
  argv: string[],
  cwd: string = process.cwd(),
): ParsedCliArgs => {
  let parsed: ReturnType<typeof parseRawArgs>;
  try {
    parsed = parseRawArgs(argv);
  } catch (error) {
    return {
      ok: false,
      errorMessage: error instanceof Error ? error.message : String(error),
    };
  }

  const { values, positionals } = parsed;
  const [first, ...rest] = positionals;
  let command: CliCommand = 'generate';
  let requests: string[] = positionals;
  if (first !== undefined) {
    if (!isCommand(first)) {
      return { ok: false, errorMessage: `Unknown command: ${first}` };
    }
    command = first;
    requests = rest;
  }

  if (command === 'explain' && requests.length === 0 && !values.help) {
    return { ok: false, errorMessage: 'explain needs at least one request.' };
  }
  if (command !== 'explain' && requests.length > 0) {
    return {
      ok: false,
      errorMessage: `Unexpected argument: ${requests[0]}`,
    };
  }
  if (values.watch && command !== 'generate') {
    return { ok: false, errorMessage: '--watch only applies to generate.' };
  }

  // Only flags that were given become overrides, so they never mask the
  // settings file with undefined values.
  const rawOverrides: Record<string, string> = {};
  const flagToSetting = [
    ['config', 'configPath'],
    ['name', 'configName'],
    ['out', 'outFile'],
    ['format', 'format'],
    ['asset-strategy', 'assetStrategy'],
    ['css-modules', 'cssModules'],
    ['stub-dir', 'stubDir'],
  ] as const;
  for (const [flag, setting] of flagToSetting) {
    const value = values[flag];
    if (value !== undefined) {
      rawOverrides[setting] = value;
    }
  }

  let overrides: BridgeSettings;
  try {
    overrides = parseBridgeSettings(rawOverrides, 'command line');
  } catch (error) {
    return {
      ok: false,
      errorMessage: error instanceof Error ? error.message : String(error),
    };
  }

  return {
    ok: true,
    command,
    rootDir: path.resolve(cwd, values.root ?? '.'),
    overrides,
    requests,
    force: values.force ?? false,
    watch: values.watch ?? false,
    help: values.help ?? false,
  };
};

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

const relativeToCwd = (filePath: string) =>
  path.relative(process.cwd(), filePath) || '.';

export const describeWrite = (write: WriteJestConfigResult) => {
  const file = relativeToCwd(write.filePath);
  switch (write.status) {
    case 'created':
      return `Created ${file}`;
    case 'updated':
      return `Updated ${file}`;
    case 'unchanged':
      return `${file} is up to date`;
    case 'merged':
      return write.hadConflicts
        ? `Merged ${file}; conflicting hand edits were replaced by generated lines`
        : `Merged ${file}, keeping hand edits`;
    case 'skipped':
      return `Skipped ${file}: it was not written by ${PROGRAM_NAME}. Re-run with --force to overwrite it.`;
  }
};

const reportWarnings = (warnings: BridgeWarning[]) => {
  for (const warning of warnings) {
    console.error(`warning [${warning.code}]: ${warning.message}`);
  }
};

const runGenerate = async (
  settings: ResolvedBridgeSettings,
  force: boolean,
) => {
  const result = await generate(settings, { force });
  reportWarnings(result.warnings);
  for (const stubPath of result.stubsWritten) {
    console.log(`Wrote ${relativeToCwd(stubPath)}`);
  }
  console.log(describeWrite(result.write));
  return result.write.status === 'skipped' ? 1 : 0;
};

export type CliDependencies = {
  /** Creates file watchers for `--watch`; chokidar by default. */
  watch?: WatchFactory;
  /** Registers the handler that stops watching; SIGINT by default. */
  onInterrupt?: (stop: () => void) => void;
};

const interruptOnSigint = (stop: () => void) => {
  process.once('SIGINT', stop);
};

const startWatching = (
  rootDir: string,
  overrides: BridgeSettings,
  initial: ResolvedBridgeSettings,
  force: boolean,
  { watch, onInterrupt = interruptOnSigint }: CliDependencies,
) => {
  const settingsPath = path.join(rootDir, SETTINGS_FILE_NAME);
  let watchedConfigPath = initial.configPath;

  const regenerate = async (changedPath: string) => {
    console.log(`${relativeToCwd(changedPath)} changed, regenerating...`);
    const settings = await loadResolvedSettings(rootDir, overrides);
    // The settings file can point at a different bundler config.
    if (settings.configPath !== watchedConfigPath) {
      const previous = watcher;
      watchedConfigPath = settings.configPath;
      watcher = openWatcher(settings.configPath);
      await previous.close();
    }
    await runGenerate(settings, force);
  };

  const openWatcher = (configPath: string) => {
    const configWatcher = createConfigWatcher({
      paths: [configPath, settingsPath],
      onChange: regenerate,
      watch,
    });
    console.log(`Watching ${relativeToCwd(configPath)} for changes.`);
    return configWatcher;
  };

  let watcher = openWatcher(initial.configPath);

  onInterrupt(() => {
    watcher.close().catch((error: unknown) => {
      console.error('Failed to stop the config watcher:', error);
    });
  });
};

/** Runs the CLI and resolves to the process exit code. */
export const runCli = async (
  argv: string[],
  dependencies: CliDependencies = {},
): Promise<number> => {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(`${PROGRAM_NAME}: ${parsed.errorMessage}`);
    console.error(USAGE);
    return 1;
  }
  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    const settings = await loadResolvedSettings(parsed.rootDir, parsed.overrides);

    switch (parsed.command) {
      case 'generate': {
        if (!parsed.watch) {
          return await runGenerate(settings, parsed.force);
        }
        // Keep watching even when the first run fails.
        try {
          await runGenerate(settings, parsed.force);
        } catch (error) {
          const errorMessage = error instanceof Error ? error.message : String(error);
          console.error(`${PROGRAM_NAME}: ${errorMessage}`);
        }
        startWatching(
          parsed.rootDir,
          parsed.overrides,
          settings,
          parsed.force,
          dependencies,
        );
        return 0;
      }

      case 'explain': {
        const built = await buildFromSettings(settings);
        reportWarnings(built.warnings);
        for (const request of parsed.requests) {
          console.log(
            formatExplanation(
              request,
              explainRequest(request, built.config, settings.rootDir),
            ),
          );
        }
        return 0;
      }

      case 'stubs': {
        const built = await buildFromSettings(settings);
        const written = await writeStubFiles(stubDirectoryFor(settings), built.stubs);
        for (const stubPath of written) {
          console.log(`Wrote ${relativeToCwd(stubPath)}`);
        }
        if (written.length === 0) {
          console.log('Stub files are up to date');
        }
        return 0;
      }
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`${PROGRAM_NAME}: ${errorMessage}`);
    return 1;
  }
};
