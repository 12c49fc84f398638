import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['SIGNUP-BACKEND/**/__tests__/**/*.test.ts'],
  },
});
