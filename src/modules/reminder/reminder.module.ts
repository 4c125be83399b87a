/**
 * ReminderModule — owner-scoped reminder CRUD over TypeORM.
 *
 * Owns:
 * - Reminder entity + repository (REMINDER_REPOSITORY)
 * - ReminderService + ReminderController
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import reminderConfig from './config/reminder.config';
import { Reminder } from './entities/reminder.entity';
import { REMINDER_REPOSITORY, TypeOrmReminderRepository } from './repositories';
import { ReminderService } from './services/reminder.service';
import { ReminderController } from './reminder.controller';

@Module({
  imports: [
    ConfigModule.forFeature(reminderConfig),
    TypeOrmModule.forFeature([Reminder]),
  ],
  controllers: [ReminderController],
  providers: [
    ReminderService,
    {
      provide: REMINDER_REPOSITORY,
      useClass: TypeOrmReminderRepository,
    },
  ],
  exports: [ReminderService, REMINDER_REPOSITORY],
})
export class ReminderModule {}
