/**
 * ReminderService — owner-scoped reminder operations.
 *
 * Every lookup carries the caller's userId, so a reminder owned by someone
 * else is indistinguishable from one that does not exist (404, never 403).
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import reminderConfig from '../config/reminder.config';
import {
  DuplicateReminderException,
  ReminderNotFoundException,
} from '../errors/reminder.errors';
import {
  REMINDER_REPOSITORY,
  type IReminderRepository,
} from '../repositories/reminder.repository.interface';
import type { Reminder } from '../entities/reminder.entity';
import type { CreateReminderDto } from '../dto/create-reminder.dto';
import type { ReminderQueryDto } from '../dto/reminder-query.dto';
import type {
  DeleteReminderResponseDto,
  ReminderResponseDto,
} from '../dto/reminder-response.dto';

@Injectable()
export class ReminderService {
  private readonly logger = new Logger(ReminderService.name);

  constructor(
    @Inject(REMINDER_REPOSITORY)
    private readonly reminders: IReminderRepository,
    @Inject(reminderConfig.KEY)
    private readonly config: ConfigType<typeof reminderConfig>,
  ) {}

  /**
   * Create a reminder for the caller.
   * The duplicate check and the insert are two round trips; two concurrent
   * identical creates can both succeed.
   */
  async create(
    userId: string,
    dto: CreateReminderDto,
  ): Promise<ReminderResponseDto> {
    if (this.config.rejectDuplicates) {
      const duplicate = await this.reminders.exists({
        userId,
        date: dto.date,
        text: dto.text,
      });
      if (duplicate) throw new DuplicateReminderException();
    }

    const reminder = await this.reminders.create({
      userId,
      date: dto.date,
      text: dto.text,
    });

    this.logger.log(
      `Reminder ${reminder.id} created for user ${userId} on ${reminder.date}`,
    );
    return this.serializeReminder(reminder);
  }

  /**
   * All of the caller's reminders, optionally limited to an inclusive date
   * range. No ordering is promised.
   */
  async findAll(
    userId: string,
    query: ReminderQueryDto,
  ): Promise<ReminderResponseDto[]> {
    const reminders = await this.reminders.filter({
      userId,
      dateFrom: query.start_date,
      dateTo: query.end_date,
    });
    return reminders.map((r) => this.serializeReminder(r));
  }

  async findOne(userId: string, id: string): Promise<ReminderResponseDto> {
    const reminder = await this.reminders.get({ id, userId });
    if (!reminder) throw new ReminderNotFoundException();
    return this.serializeReminder(reminder);
  }

  async remove(userId: string, id: string): Promise<DeleteReminderResponseDto> {
    const deleted = await this.reminders.delete({ id, userId });
    if (!deleted) throw new ReminderNotFoundException();

    this.logger.log(`Reminder ${id} deleted by user ${userId}`);
    return { success: true };
  }

  private serializeReminder(r: Reminder): ReminderResponseDto {
    return {
      id: r.id,
      user_id: r.userId,
      date: r.date,
      text: r.text,
    };
  }
}
