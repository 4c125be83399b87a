import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import databaseConfig from '../config/database.config';
import { createTypeOrmOptions } from './typeorm-options';

// TypeOrmModule registers the DataSource globally, so feature modules only
// need TypeOrmModule.forFeature() for their own entities.
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule.forFeature(databaseConfig)],
      inject: [databaseConfig.KEY],
      useFactory: (config: ConfigType<typeof databaseConfig>) =>
        createTypeOrmOptions(config),
    }),
  ],
})
export class DatabaseModule {}
