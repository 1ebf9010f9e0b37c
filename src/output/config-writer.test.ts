import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getSnapshotPath, writeJestConfigFile } from './config-writer';

const lines = (...parts: string[]) => parts.join('\n');

let workDir: string;
let filePath: string;
let cacheDir: string;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-writer-'));
  filePath = path.join(workDir, 'jest.config.js');
  cacheDir = path.join(workDir, 'cache');
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

const write = (content: string, force = false) =>
  writeJestConfigFile({ filePath, content, cacheDir, force });

const readOutput = () => fs.readFile(filePath, 'utf8');

describe('getSnapshotPath', () => {
  it('keeps the base name and separates same-named files', () => {
    const first = getSnapshotPath('/cache', '/a/jest.config.js');
    const second = getSnapshotPath('/cache', '/b/jest.config.js');

    expect(path.dirname(first)).toBe('/cache');
    expect(path.basename(first)).toMatch(/^[0-9a-f]{12}-jest\.config\.js\.base$/);
    expect(first).not.toBe(second);
  });
});

describe('writeJestConfigFile', () => {
  const original = lines('a', 'b', 'c', 'd', 'e', '');

  it('creates the file and its snapshot', async () => {
    await expect(write(original)).resolves.toEqual({
      filePath,
      status: 'created',
      hadConflicts: false,
    });
    expect(await readOutput()).toBe(original);
    expect(await fs.readFile(getSnapshotPath(cacheDir, filePath), 'utf8')).toBe(original);
  });

  it('reports unchanged output', async () => {
    await write(original);

    expect((await write(original)).status).toBe('unchanged');
  });

  it('replaces an unedited file', async () => {
    await write(original);
    const next = lines('a', 'b', 'c', 'd', 'E', '');

    expect((await write(next)).status).toBe('updated');
    expect(await readOutput()).toBe(next);
  });

  it('keeps hand edits that do not touch regenerated lines', async () => {
    await write(original);
    await fs.writeFile(filePath, lines('A', 'b', 'c', 'd', 'e', ''), 'utf8');

    const result = await write(lines('a', 'b', 'c', 'd', 'E', ''));

    expect(result).toEqual({ filePath, status: 'merged', hadConflicts: false });
    expect(await readOutput()).toBe(lines('A', 'b', 'c', 'd', 'E', ''));
  });

  it('lets generated lines win a conflict', async () => {
    await write(original);
    await fs.writeFile(filePath, lines('a', 'b', 'mine', 'd', 'e', ''), 'utf8');

    const result = await write(lines('a', 'b', 'new', 'd', 'e', ''));

    expect(result).toEqual({ filePath, status: 'merged', hadConflicts: true });
    expect(await readOutput()).toBe(lines('a', 'b', 'new', 'd', 'e', ''));
  });

  it('leaves a hand-edited file alone when the output did not change', async () => {
    await write(original);
    const edited = lines('a', 'b', 'c', 'd', 'e', '// local note', '');
    await fs.writeFile(filePath, edited, 'utf8');

    expect((await write(original)).status).toBe('unchanged');
    expect(await readOutput()).toBe(edited);
  });

  it('skips a file it did not write unless forced', async () => {
    await fs.writeFile(filePath, 'module.exports = {};\n', 'utf8');

    expect((await write(original)).status).toBe('skipped');
    expect(await readOutput()).toBe('module.exports = {};\n');

    expect((await write(original, true)).status).toBe('updated');
    expect(await readOutput()).toBe(original);
  });
});
