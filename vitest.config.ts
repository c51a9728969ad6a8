import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    globals: false,
    // Loading the Ruby grammar WASM on a cold cache can take a moment
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
