import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  'fluent-query': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    projects: [
      {
        resolve: { alias },
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        resolve: { alias },
        test: {
          name: 'movies-app',
          include: ['movies-app/tests/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
    ],
  },
});
