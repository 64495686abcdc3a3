import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (name: string): string => fileURLToPath(new URL(`../${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@product-importer/core': source('core'),
      '@product-importer/csv': source('csv'),
      '@product-importer/webhooks': source('webhooks'),
      '@product-importer/state-sequelize': source('state-sequelize'),
    },
  },
  test: {
    name: 'server',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/main.ts'],
    },
  },
});
