import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

function local(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'apps/*/test/**/*.test.ts',
    ],
    environment: 'node',
  },
  resolve: {
    alias: {
      '@mortgage-risk/domain': local('./packages/domain/src/index.ts'),
      '@mortgage-risk/contract': local('./packages/contract/src/index.ts'),
    },
  },
});
