import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment configuration
    environment: 'node',
    testTimeout: 15000,
    // Coverage configuration
    coverage: {
      reporter: ['text', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/*.config.*',
        'src/bin.ts',
        'tests/**'
      ]
    },
    // Include test files
    include: [
      'tests/**/*.{test,spec}.ts'
    ]
  }
});
