//
// Writes the generated Jest config without clobbering hand edits. The text
// written last time is kept as a snapshot in the cache directory; on the next
// run it is the common ancestor for a line merge between the file on disk and
// the freshly generated text.
//
import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { readTextFileIfExists } from '../fs-utils';
import { mergeDocumentLines } from './line-merge';

export type WriteJestConfigStatus =
  | 'created'
  | 'unchanged'
  | 'updated'
  | 'merged'
  | 'skipped';

export type WriteJestConfigRequest = {
  filePath: string;
  content: string;
  cacheDir: string;
  /** Overwrite a file that was not written by us (no snapshot exists). */
  force?: boolean;
};

export type WriteJestConfigResult = {
  filePath: string;
  status: WriteJestConfigStatus;
  hadConflicts: boolean;
};

/** Snapshot location for one output file; hashed so same-named files in different folders do not collide. */
export const getSnapshotPath = (cacheDir: string, filePath: string) => {
  const absolutePath = path.resolve(filePath);
  const digest = createHash('sha256').update(absolutePath).digest('hex').slice(0, 12);
  return path.join(cacheDir, `${digest}-${path.basename(absolutePath)}.base`);
};

const writeFileEnsuringDirectory = async (filePath: string, content: string) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
};

export const writeJestConfigFile = async ({
  filePath,
  content,
  cacheDir,
  force = false,
}: WriteJestConfigRequest): Promise<WriteJestConfigResult> => {
  const snapshotPath = getSnapshotPath(cacheDir, filePath);
  const saveSnapshot = () => writeFileEnsuringDirectory(snapshotPath, content);
  const result = (
    status: WriteJestConfigStatus,
    hadConflicts = false,
  ): WriteJestConfigResult => ({ filePath, status, hadConflicts });

  const existing = await readTextFileIfExists(filePath);
  if (existing === null) {
    await writeFileEnsuringDirectory(filePath, content);
    await saveSnapshot();
    return result('created');
  }

  if (existing === content) {
    await saveSnapshot();
    return result('unchanged');
  }

  const base = await readTextFileIfExists(snapshotPath);
  if (base === null) {
    // Without a snapshot there is no way to tell hand edits from stale output.
    if (!force) {
      return result('skipped');
    }
    await fs.writeFile(filePath, content, 'utf8');
    await saveSnapshot();
    return result('updated');
  }

  if (existing === base) {
    await fs.writeFile(filePath, content, 'utf8');
    await saveSnapshot();
    return result('updated');
  }

  const merged = mergeDocumentLines(base, existing, content);
  await saveSnapshot();
  if (merged.content === existing) {
    return result('unchanged');
  }
  await fs.writeFile(filePath, merged.content, 'utf8');
  return result('merged', merged.hadConflicts);
};
