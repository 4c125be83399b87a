import type { ConfigType } from '@nestjs/config';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import databaseConfig from '../config/database.config';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Build TypeORM connection options from the `database` config namespace.
 * Entities are picked up from each module's `TypeOrmModule.forFeature()`.
 */
export const createTypeOrmOptions = (
  config: ConfigType<typeof databaseConfig>,
): TypeOrmModuleOptions => {
  if (config.type === 'sqljs') {
    // sql.js keeps the database in memory; a file location is written back on every change
    const persistence =
      config.database === IN_MEMORY_DATABASE
        ? {}
        : { location: config.database, autoSave: true };

    return {
      type: 'sqljs',
      ...persistence,
      autoLoadEntities: true,
      synchronize: config.synchronize,
      logging: config.logging,
    };
  }

  return {
    type: 'postgres',
    url: config.url,
    autoLoadEntities: true,
    synchronize: config.synchronize,
    logging: config.logging,
  };
};
