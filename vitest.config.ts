import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Timing-sensitive retransmission tests: keep files sequential
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    maxConcurrency: 3,
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/types/**', // Type definitions only
        'src/index.ts',
        'src/constants.ts', // Constants only
        'src/**/index.ts', // Re-export files
        'src/cli/index.ts', // CLI entry not unit testable
        'src/utils/colors.ts', // Color detection at module load time
      ],
      all: true,
    },
  },
});
