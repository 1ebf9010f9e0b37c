//
// Small filesystem helpers shared by the writers and the settings reader.
//
import { promises as fs } from 'node:fs';

const isMissingFileError = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Reads a UTF-8 file, or returns null when it does not exist. */
export const readTextFileIfExists = async (
  filePath: string,
): Promise<string | null> => {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
};

/** Files can disappear between checks, so access errors become `false`. */
export const canReadFile = async (filePath: string) => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};
