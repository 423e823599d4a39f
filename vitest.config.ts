import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['keeper/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
