import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/test/**/*.test.ts', 'compiler/test/**/*.test.ts', 'converter/tests/**/*.test.ts'],
    environment: 'node',
  },
});
