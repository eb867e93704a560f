import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['sdks/typescript/*/src/**/*.test.ts'],
  },
});
