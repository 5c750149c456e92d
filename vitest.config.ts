import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],

    pool: 'forks',
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    clearMocks: true,       // Clear mock history
    unstubEnvs: true,       // Undo vi.stubEnv after each test

    watch: false,
  },
});
