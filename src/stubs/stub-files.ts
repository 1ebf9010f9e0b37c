//
// Stub modules the generated config points at. Jest loads these in place of
// assets the bundler would normally emit, so each one is tiny CommonJS.
//
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { readTextFileIfExists } from '../fs-utils';
import type { StubKind } from '../shared-types';
import { FILE_STUB_VALUE, renderFileTransformerSource } from './file-transformer';

export const STUB_FILE_NAMES: Record<StubKind, string> = {
  file: 'fileMock.js',
  style: 'styleMock.js',
  empty: 'emptyModule.js',
  transformer: 'fileTransformer.js',
};

const STUB_SOURCES: Record<StubKind, () => string> = {
  file: () => `module.exports = ${JSON.stringify(FILE_STUB_VALUE)};\n`,
  style: () => 'module.exports = {};\n',
  empty: () => 'module.exports = {};\n',
  transformer: renderFileTransformerSource,
};

export type StubFile = {
  kind: StubKind;
  fileName: string;
  content: string;
};

/** Contents for each requested stub, in a stable order and without repeats. */
export const renderStubFiles = (kinds: StubKind[]): StubFile[] => {
  const order: StubKind[] = ['file', 'style', 'empty', 'transformer'];
  const requested = new Set(kinds);
  return order
    .filter((kind) => requested.has(kind))
    .map((kind) => ({
      kind,
      fileName: STUB_FILE_NAMES[kind],
      content: STUB_SOURCES[kind](),
    }));
};

/**
 * Writes the requested stubs into `stubDirectory`, skipping files that already
 * hold the expected content. Returns the paths that were written.
 */
export const writeStubFiles = async (
  stubDirectory: string,
  kinds: StubKind[],
): Promise<string[]> => {
  const files = renderStubFiles(kinds);
  if (files.length === 0) {
    return [];
  }

  await fs.mkdir(stubDirectory, { recursive: true });
  const written: string[] = [];
  for (const file of files) {
    const filePath = path.join(stubDirectory, file.fileName);
    if ((await readTextFileIfExists(filePath)) === file.content) {
      continue;
    }
    await fs.writeFile(filePath, file.content, 'utf8');
    written.push(filePath);
  }
  return written;
};
