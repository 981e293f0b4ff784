import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    silent: true,
    include: ['test/**/*.test.ts'],
  },
});
