import { describe, expect, it } from 'vitest';

import { expandRootDir, isInsideRoot, stubPath, toRootDirPath } from './root-dir';

const ROOT = '/project';

describe('isInsideRoot', () => {
  it('accepts the root and its descendants', () => {
    expect(isInsideRoot('/project', ROOT)).toBe(true);
    expect(isInsideRoot('/project/src/app', ROOT)).toBe(true);
  });

  it('accepts children whose names start with two dots', () => {
    expect(isInsideRoot('/project/..generated/api', ROOT)).toBe(true);
  });

  it('rejects siblings that share a prefix', () => {
    expect(isInsideRoot('/project-two', ROOT)).toBe(false);
    expect(isInsideRoot('/shared', ROOT)).toBe(false);
  });
});

describe('toRootDirPath', () => {
  it('rewrites paths under the root', () => {
    expect(toRootDirPath('/project/src/app', ROOT)).toBe('<rootDir>/src/app');
    expect(toRootDirPath('/project', ROOT)).toBe('<rootDir>');
  });

  it('rewrites children whose names start with two dots', () => {
    expect(toRootDirPath('/project/..generated/api', ROOT)).toBe(
      '<rootDir>/..generated/api',
    );
  });

  it('leaves paths outside the root absolute', () => {
    expect(toRootDirPath('/shared/lib', ROOT)).toBe('/shared/lib');
  });
});

describe('expandRootDir', () => {
  it('replaces a leading token', () => {
    expect(expandRootDir('<rootDir>/src/a.js', ROOT)).toBe('/project/src/a.js');
    expect(expandRootDir('<rootDir>', ROOT)).toBe('/project');
  });

  it('leaves module names alone', () => {
    expect(expandRootDir('identity-obj-proxy', ROOT)).toBe('identity-obj-proxy');
  });
});

describe('stubPath', () => {
  it('joins the stub directory under <rootDir>', () => {
    expect(stubPath('test/__mocks__', 'fileMock.js')).toBe(
      '<rootDir>/test/__mocks__/fileMock.js',
    );
  });

  it('normalizes leading ./ and trailing slashes', () => {
    expect(stubPath('./mocks/', 'styleMock.js')).toBe('<rootDir>/mocks/styleMock.js');
    expect(stubPath('.', 'styleMock.js')).toBe('<rootDir>/styleMock.js');
  });

  it('keeps hidden directory names', () => {
    expect(stubPath('.mocks', 'fileMock.js')).toBe('<rootDir>/.mocks/fileMock.js');
  });
});
