import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // CLI and integration suites point LOCKBOX_DB_PATH at per-test temp dirs
    pool: 'forks',
    coverage: {
      exclude: [
        'src/server/types.ts',
        'dist/**',
        'tsup.config.ts',
        'vitest.config.ts',
      ],
    },
  },
});
