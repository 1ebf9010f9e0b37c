//
// Jest transformer for static files: the module body becomes the file's base
// name.
//
import { createHash } from 'node:crypto';
import path from 'node:path';

/** Value the file stub exports when assets are mapped instead of transformed. */
export const FILE_STUB_VALUE = 'test-file-stub';

export type TransformedSource = {
  code: string;
};

export const fileTransformer = {
  process: (_sourceText: string, sourcePath: string): TransformedSource => ({
    code: `module.exports = ${JSON.stringify(path.basename(sourcePath))};`,
  }),

  // Keyed on path and source.
  getCacheKey: (sourceText: string, sourcePath: string): string =>
    createHash('sha256').update(sourcePath).update('\0').update(sourceText).digest('hex'),
};

/** Standalone CommonJS source of the transformer, written next to the stubs. */
export const renderFileTransformerSource = () =>
  [
    "const crypto = require('crypto');",
    "const path = require('path');",
    '',
    'module.exports = {',
    '  process(sourceText, sourcePath) {',
    '    return {',
    '      code: `module.exports = ${JSON.stringify(path.basename(sourcePath))};`,',
    '    };',
    '  },',
    '',
    '  getCacheKey(sourceText, sourcePath) {',
    "    return crypto.createHash('sha256').update(sourcePath).update('\\0').update(sourceText).digest('hex');",
    '  },',
    '};',
    '',
  ].join('\n');
