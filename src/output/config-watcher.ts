//
// Watches the bundler config (and the bridge settings file) and regenerates
// the Jest config after edits settle. Editors often save in bursts of
// change/add events, so notifications are debounced into a single run.
//
import { watch as watchWithChokidar } from 'chokidar';

const DEFAULT_DEBOUNCE_MS = 150;

/** The part of a chokidar watcher this module relies on. */
export type FileWatcher = {
  on(event: 'change' | 'add', listener: (filePath: string) => void): unknown;
  on(event: 'error', listener: (error: unknown) => void): unknown;
  close(): Promise<void>;
};

export type WatchFactory = (
  paths: string[],
  options: { ignoreInitial: boolean; persistent: boolean },
) => FileWatcher;

type ConfigWatcherOptions = {
  paths: string[];
  onChange: (changedPath: string) => Promise<void>;
  debounceMs?: number;
  watch?: WatchFactory;
};

export type ConfigWatcher = {
  close: () => Promise<void>;
};

export const createConfigWatcher = ({
  paths,
  onChange,
  debounceMs = DEFAULT_DEBOUNCE_MS,
  watch = watchWithChokidar,
}: ConfigWatcherOptions): ConfigWatcher => {
  let pendingChangeTimeout: ReturnType<typeof setTimeout> | null = null;
  let lastChangedPath: string | null = null;
  let activeRun: Promise<void> | null = null;
  let rerunRequested = false;
  let closed = false;

  // Failures are logged; the watcher keeps running.
  const runOnChange = async (changedPath: string) => {
    try {
      await onChange(changedPath);
    } catch (error) {
      console.error(`Regeneration after ${changedPath} changed failed:`, error);
    }
  };

  // One regeneration at a time. Changes that land mid-run queue exactly one
  // follow-up run with the latest path.
  const startRun = () => {
    if (activeRun) {
      rerunRequested = true;
      return;
    }
    if (closed || !lastChangedPath) {
      return;
    }

    activeRun = runOnChange(lastChangedPath).finally(() => {
      activeRun = null;
      if (rerunRequested) {
        rerunRequested = false;
        startRun();
      }
    });
  };

  const scheduleChange = (changedPath: string) => {
    lastChangedPath = changedPath;
    if (pendingChangeTimeout) {
      clearTimeout(pendingChangeTimeout);
    }

    pendingChangeTimeout = setTimeout(() => {
      pendingChangeTimeout = null;
      startRun();
    }, debounceMs);
  };

  const watcher = watch(paths, { ignoreInitial: true, persistent: true });
  watcher.on('change', scheduleChange);
  watcher.on('add', scheduleChange);
  watcher.on('error', (error) => {
    console.error(`Config watcher error for ${paths.join(', ')}`, error);
  });

  // Clear the debounce timer before closing the underlying watcher.
  const close = async () => {
    closed = true;
    if (pendingChangeTimeout) {
      clearTimeout(pendingChangeTimeout);
      pendingChangeTimeout = null;
    }
    await watcher.close();
  };

  return { close };
};
