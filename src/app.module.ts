import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './modules/health/health.module';
import { ReminderModule } from './modules/reminder/reminder.module';
import { UserIdGuard } from './common/guards/user-id.guard';

// Configs
import appConfig from './config/app.config';

@Module({
  imports: [
    // ========================================================================
    // 1. INFRASTRUCTURE & CONFIGURATION
    // ========================================================================
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
      envFilePath: ['.env.local', '.env'],
    }),
    DatabaseModule,

    // ========================================================================
    // 2. FEATURE MODULES
    // ========================================================================
    ReminderModule,
    HealthModule,
  ],
  providers: [
    {
      // Every route needs X-User-Id unless marked @Public()
      provide: APP_GUARD,
      useClass: UserIdGuard,
    },
  ],
})
export class AppModule {}
