//
// Helpers for Jest's `<rootDir>` token. Generated configs only ever contain
// posix separators so the same file works on every platform.
//
import path from 'node:path';

export const ROOT_DIR_TOKEN = '<rootDir>';

const toPosix = (value: string) => value.split(path.sep).join('/');

/** True when `absolutePath` is `rootDir` or lives underneath it. */
export const isInsideRoot = (absolutePath: string, rootDir: string) => {
  const relative = path.relative(rootDir, absolutePath);
  // `..generated` is a child; `..` and `../x` are not.
  const escapesRoot =
    relative === '..' || relative.startsWith(`..${path.sep}`);
  return relative === '' || (!escapesRoot && !path.isAbsolute(relative));
};

/** Rewrites an absolute path under rootDir as `<rootDir>/...`. */
export const toRootDirPath = (absolutePath: string, rootDir: string) => {
  const resolved = path.resolve(absolutePath);
  if (!isInsideRoot(resolved, rootDir)) {
    return toPosix(resolved);
  }
  const relative = toPosix(path.relative(rootDir, resolved));
  return relative === '' ? ROOT_DIR_TOKEN : `${ROOT_DIR_TOKEN}/${relative}`;
};

/** Replaces a leading `<rootDir>` with the absolute root. */
export const expandRootDir = (value: string, rootDir: string) => {
  if (!value.startsWith(ROOT_DIR_TOKEN)) {
    return value;
  }
  const rest = value.slice(ROOT_DIR_TOKEN.length).replace(/^[\\/]+/, '');
  return rest === '' ? path.resolve(rootDir) : path.join(rootDir, rest);
};

/** `<rootDir>/<stubDir>/<fileName>` with the stub dir normalized to posix. */
export const stubPath = (stubDir: string, fileName: string) => {
  const normalizedDir = toPosix(path.normalize(stubDir))
    .replace(/^\.(?:\/|$)/, '')
    .replace(/\/$/, '');
  return normalizedDir === ''
    ? `${ROOT_DIR_TOKEN}/${fileName}`
    : `${ROOT_DIR_TOKEN}/${normalizedDir}/${fileName}`;
};
