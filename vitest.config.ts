import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    root: './',
    environment: 'node',
    include: ['src/**/*.spec.ts', 'test/**/*.e2e-spec.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    setupFiles: ['./test/setup.ts'],
    // Every test process gets its own in-memory store
    env: {
      NODE_ENV: 'test',
      DATABASE_TYPE: 'sqljs',
      DATABASE_NAME: ':memory:',
      DATABASE_SYNCHRONIZE: 'true',
      LOG_LEVELS: 'error',
      REMINDER_REJECT_DUPLICATES: 'true',
    },
  },
  plugins: [
    // NestJS and TypeORM decorators need emitted metadata
    swc.vite({
      module: { type: 'es6' },
    }),
  ],
});
