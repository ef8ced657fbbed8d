import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['dir-mirror/src/**/*.test.ts'],
    environment: 'node',
  },
});
