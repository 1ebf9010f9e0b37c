//
// Vitest config for the generator modules. Filesystem tests work in temp
// directories, so no setup files or custom environment are needed.
//
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
});
