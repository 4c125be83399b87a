import { registerAs } from '@nestjs/config';

export type DatabaseType = 'postgres' | 'sqljs';

export default registerAs('database', () => {
  const type: DatabaseType =
    process.env.DATABASE_TYPE === 'sqljs' ? 'sqljs' : 'postgres';

  return {
    type,
    // postgres
    url: process.env.DATABASE_URL || 'postgres://localhost:5432/reminders',
    // sqljs (file path or ':memory:')
    database: process.env.DATABASE_NAME || 'reminders.sqlite',
    // Schema sync stays off in production unless asked for explicitly
    synchronize: process.env.DATABASE_SYNCHRONIZE
      ? process.env.DATABASE_SYNCHRONIZE === 'true'
      : process.env.NODE_ENV !== 'production',
    logging: process.env.DATABASE_LOGGING === 'true',
  };
});
