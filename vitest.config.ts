import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ticktask/core': pkg('core'),
      '@ticktask/engine': pkg('engine'),
      '@ticktask/adapters': pkg('adapters'),
      '@ticktask/testing': pkg('testing'),
      'ticktask': pkg('ticktask')
    }
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000
  }
});
