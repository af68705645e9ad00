import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/src/**/*.{test,spec}.ts'],
    env: {
      LOG_LEVEL: 'silent'
    }
  },
  resolve: {
    alias: {
      '@jobmatch/common': path.resolve(__dirname, 'services/common/src/index.ts'),
      '@jobmatch/embed-svc': path.resolve(__dirname, 'services/jm-embed-svc/src/index.ts')
    }
  }
});
