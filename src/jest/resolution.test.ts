import { describe, expect, it } from 'vitest';

import type { JestModuleConfig } from '../shared-types';
import {
  applyModuleNameMapper,
  explainRequest,
  formatExplanation,
} from './resolution';

const config: JestModuleConfig = {
  moduleDirectories: ['node_modules'],
  moduleNameMapper: {
    '\\.module\\.css$': 'identity-obj-proxy',
    '\\.css$': '<rootDir>/test/__mocks__/styleMock.js',
    '\\.png$': '<rootDir>/test/__mocks__/fileMock.js',
    '^legacy$': '<rootDir>/test/__mocks__/emptyModule.js',
    '^@app/(.*)$': '<rootDir>/src/$1',
    '^lib$': ['<rootDir>/lib', '<rootDir>/vendor/lib'],
  },
  transform: {
    '\\.tsx?$': 'ts-jest',
    '\\.svg$': '<rootDir>/test/__mocks__/fileTransformer.js',
  },
};

describe('applyModuleNameMapper', () => {
  it('substitutes capture groups and expands <rootDir>', () => {
    expect(
      applyModuleNameMapper('@app/utils/date', config.moduleNameMapper, '/project'),
    ).toEqual({
      pattern: '^@app/(.*)$',
      candidates: ['/project/src/utils/date'],
    });
  });

  it('uses the first matching entry', () => {
    expect(
      applyModuleNameMapper('./button.module.css', config.moduleNameMapper, '/project'),
    ).toEqual({ pattern: '\\.module\\.css$', candidates: ['identity-obj-proxy'] });
  });

  it('returns null when nothing matches', () => {
    expect(applyModuleNameMapper('lodash', config.moduleNameMapper, '/project')).toBeNull();
  });

  it('reports patterns that are not valid regular expressions', () => {
    expect(() => applyModuleNameMapper('x', { '(': 'y' }, '/project')).toThrow(
      'Invalid moduleNameMapper pattern "("',
    );
  });
});

describe('explainRequest', () => {
  it('names the kind of mapping', () => {
    expect(explainRequest('./logo.png', config, '/project')).toEqual({
      kind: 'mapped',
      via: 'file-stub',
      pattern: '\\.png$',
      candidates: ['/project/test/__mocks__/fileMock.js'],
    });
    expect(explainRequest('./theme.css', config, '/project')).toMatchObject({
      via: 'style-stub',
    });
    expect(explainRequest('./grid.module.css', config, '/project')).toMatchObject({
      via: 'style-proxy',
    });
    expect(explainRequest('legacy', config, '/project')).toMatchObject({
      via: 'empty-module',
    });
    expect(explainRequest('lib', config, '/project')).toEqual({
      kind: 'mapped',
      via: 'alias',
      pattern: '^lib$',
      candidates: ['/project/lib', '/project/vendor/lib'],
    });
  });

  it('falls through to the transform map', () => {
    expect(explainRequest('./icon.svg', config, '/project')).toEqual({
      kind: 'transformed',
      pattern: '\\.svg$',
      transformer: '/project/test/__mocks__/fileTransformer.js',
    });
  });

  it('reports requests Jest resolves on its own', () => {
    expect(explainRequest('react', config, '/project')).toEqual({ kind: 'unchanged' });
  });
});

describe('formatExplanation', () => {
  it('prints one line per outcome', () => {
    expect(
      formatExplanation('./logo.png', explainRequest('./logo.png', config, '/project')),
    ).toBe(
      './logo.png -> /project/test/__mocks__/fileMock.js (file stub, matched \\.png$)',
    );
    expect(formatExplanation('lib', explainRequest('lib', config, '/project'))).toBe(
      'lib -> /project/lib | /project/vendor/lib (alias, matched ^lib$)',
    );
    expect(
      formatExplanation('./App.tsx', explainRequest('./App.tsx', config, '/project')),
    ).toBe('./App.tsx -> transformed by ts-jest (matched \\.tsx?$)');
    expect(formatExplanation('react', { kind: 'unchanged' })).toBe(
      'react -> resolved normally',
    );
  });
});
