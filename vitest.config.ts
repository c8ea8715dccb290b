import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (rel: string) => fileURLToPath(new URL(`./packages/${rel}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@core-types': pkg('core-types/src/index.ts'),
      '@bs-core': pkg('bs-core/src'),
      '@payoff-core': pkg('payoff-core/src'),
      '@noarb-validation': pkg('noarb-validation/src'),
    }
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ]
  },
});
