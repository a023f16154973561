import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@termrecon/core': source('core'),
      '@termrecon/connector-file': source('connector-file'),
      '@termrecon/recon-core': source('recon-core'),
      '@termrecon/cli': source('cli'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
