import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'float-placement',
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts'],
    env: {
      FLOAT_CHECK_INVARIANTS: '1',
    },
  },
});
