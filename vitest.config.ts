import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    env: {
      OFFICE_STORE_DRIVER: 'memory',
      OFFICE_TIMEZONE: 'UTC',
    },
  },
});
