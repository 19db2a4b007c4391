import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'format',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
