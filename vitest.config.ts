import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so tests never need a build
      '@dccscan/kernel': pkg('kernel'),
      '@dccscan/cbor': pkg('cbor'),
      '@dccscan/crypto/testkit': fileURLToPath(
        new URL('./packages/crypto/src/testkit.ts', import.meta.url)
      ),
      '@dccscan/crypto': pkg('crypto'),
      '@dccscan/schema': pkg('schema'),
      '@dccscan/protocol/testkit': fileURLToPath(
        new URL('./packages/protocol/src/testkit.ts', import.meta.url)
      ),
      '@dccscan/protocol': pkg('protocol'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
