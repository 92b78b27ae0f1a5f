import path from 'node:path';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/http-client-core': path.resolve(__dirname, 'libs/http-client-core/src/index.ts'),
  '@libs/orats-client': path.resolve(__dirname, 'libs/orats-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/**/src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
