/**
 * Reminder Repository Interface
 *
 * Abstraction for reminder data access, used by ReminderService.
 */

import type { IRepository } from '../../../common/interfaces/repository.interface';
import type { Reminder } from '../entities/reminder.entity';

export const REMINDER_REPOSITORY = Symbol('REMINDER_REPOSITORY');

/**
 * Criteria for reminder lookups, combined with AND.
 * An exact `date` wins over the `dateFrom`/`dateTo` range; both range
 * bounds are inclusive.
 */
export interface ReminderFilter {
  id?: string;
  userId?: string;
  date?: string;
  text?: string;
  dateFrom?: string;
  dateTo?: string;
}

export type IReminderRepository = IRepository<Reminder, ReminderFilter>;
