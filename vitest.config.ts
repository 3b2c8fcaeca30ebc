import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

function packageEntry(name: string): string {
  return fileURLToPath(new URL(`./src/backend/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/*.test.ts'],
    },
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@village-gap/shared': packageEntry('shared'),
      '@village-gap/gap-analysis-service': packageEntry('gap-analysis-service'),
      '@village-gap/data-loader': packageEntry('data-loader'),
      '@village-gap/reporting': packageEntry('reporting'),
    },
  },
});
