import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';

/**
 * Boot the whole AppModule the way main.ts does. The store is whatever
 * DATABASE_* points at; vitest.config.ts sets an in-memory SQLite database.
 */
export const createTestApp = async (): Promise<INestApplication> => {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication();
  app.useLogger(['error']);
  configureApp(app);
  await app.init();
  return app;
};

export const userHeaders = (userId: string) => ({ 'X-User-Id': userId });
