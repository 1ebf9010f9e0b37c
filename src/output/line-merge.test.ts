import { describe, expect, it } from 'vitest';

import { mergeDocumentLines } from './line-merge';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

// Builds a multi-line string from an array of lines for readable test cases.
const lines = (...parts: string[]) => parts.join('\n');

// ---------------------------------------------------------------------------
// Trivial / short-circuit cases
// ---------------------------------------------------------------------------

describe('mergeDocumentLines: trivial cases', () => {
  it('keeps the file on disk when the generated text did not change', () => {
    const base = lines('module.exports = {', '  "rootDir": "."', '};');
    const ours = lines('module.exports = {', '  "rootDir": "..",', '};');

    const result = mergeDocumentLines(base, ours, base);

    expect(result.content).toBe(ours);
    expect(result.hadConflicts).toBe(false);
  });

  it('takes the generated text when the file on disk was never edited', () => {
    const base = lines('{', '  "moduleDirectories": ["node_modules"]', '}');
    const theirs = lines('{', '  "moduleDirectories": ["node_modules", "src"]', '}');

    const result = mergeDocumentLines(base, base, theirs);

    expect(result.content).toBe(theirs);
    expect(result.hadConflicts).toBe(false);
  });

  it('takes theirs when the hand edit already matches the new output', () => {
    const base = lines('a', 'b');
    const theirs = lines('a', 'c');

    const result = mergeDocumentLines(base, theirs, theirs);

    expect(result.content).toBe(theirs);
    expect(result.hadConflicts).toBe(false);
  });

  it('handles empty strings for all inputs', () => {
    const result = mergeDocumentLines('', '', '');

    expect(result.content).toBe('');
    expect(result.hadConflicts).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Clean merges
// ---------------------------------------------------------------------------

describe('mergeDocumentLines: non-overlapping edits', () => {
  it('keeps a hand edit at the top while regenerating a distant line', () => {
    const base = lines('Alpha', 'Bravo', 'Charlie', 'Delta', 'Echo');
    const ours = lines('ALPHA', 'Bravo', 'Charlie', 'Delta', 'Echo');
    const theirs = lines('Alpha', 'Bravo', 'Charlie', 'Delta', 'ECHO');

    const result = mergeDocumentLines(base, ours, theirs);

    expect(result.content).toBe(
      lines('ALPHA', 'Bravo', 'Charlie', 'Delta', 'ECHO'),
    );
    expect(result.hadConflicts).toBe(false);
  });

  it('keeps edits separated by an unchanged line', () => {
    const base = lines('Line one', 'Unchanged middle', 'Line three', '');
    const ours = lines('Line one EDITED', 'Unchanged middle', 'Line three', '');
    const theirs = lines('Line one', 'Unchanged middle', 'Line three EDITED', '');

    const result = mergeDocumentLines(base, ours, theirs);

    expect(result.content).toBe(
      lines('Line one EDITED', 'Unchanged middle', 'Line three EDITED', ''),
    );
    expect(result.hadConflicts).toBe(false);
  });

  it('reports no conflict when both sides make the exact same edit', () => {
    const base = lines('A', 'B', 'C');
    const ours = lines('A', 'SAME', 'C');
    const theirs = lines('A', 'SAME', 'C');

    const result = mergeDocumentLines(base, ours, theirs);

    expect(result.content).toBe(lines('A', 'SAME', 'C'));
    expect(result.hadConflicts).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Conflicts resolve to the generated text
// ---------------------------------------------------------------------------

describe('mergeDocumentLines: conflicts (generated text wins)', () => {
  it('takes theirs when both edit the same line', () => {
    const base = lines('Before', '  "^@app$": "<rootDir>/src",', 'After');
    const ours = lines('Before', '  "^@app$": "<rootDir>/lib",', 'After');
    const theirs = lines('Before', '  "^@app$": "<rootDir>/app",', 'After');

    const result = mergeDocumentLines(base, ours, theirs);

    expect(result.content).toBe(
      lines('Before', '  "^@app$": "<rootDir>/app",', 'After'),
    );
    expect(result.hadConflicts).toBe(true);
  });

  it('handles single-line documents', () => {
    const result = mergeDocumentLines('one', 'one by hand', 'one generated');

    expect(result.content).toBe('one generated');
    expect(result.hadConflicts).toBe(true);
  });
});
