import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      JWT_SECRET: 'test-secret',
      ITEMS_PER_PAGE: '10',
      TOP_RATED_LIMIT: '10'
    }
  }
});
