import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: { LOG_LEVEL: 'silent', NODE_ENV: 'test' },
    passWithNoTests: false,
  },
});
