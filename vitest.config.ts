import { defineConfig } from 'vitest/config';
import * as path from 'path';
import { fileURLToPath } from 'url';

const root = fileURLToPath(new URL('.', import.meta.url));

const packages = ['types', 'crypto', 'metadata', 'store', 'client'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@mooring/${pkg}`] = path.resolve(root, `packages/${pkg}/src/index.ts`);
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/__tests__/**'],
      reporter: ['text', 'text-summary'],
    },
  },
});
