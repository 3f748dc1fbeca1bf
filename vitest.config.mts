import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['bin/**/*.test.ts', 'lib/**/*.test.ts'],
    environment: 'node',
  },
});
