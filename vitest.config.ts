import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['./src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      exclude: ['**/types.ts', '**/*.d.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
