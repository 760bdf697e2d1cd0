import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/unit/**/*.spec.ts'],
    environment: 'node',
    // Lambda handlers write JSON logs to stdout
    silent: true,
  },
});
