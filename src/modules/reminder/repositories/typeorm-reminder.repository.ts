/**
 * TypeORM implementation of Reminder Repository
 */

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOperator,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { TypeOrmRepository } from '../../../common/base/base.repository';
import { Reminder } from '../entities/reminder.entity';
import type {
  IReminderRepository,
  ReminderFilter,
} from './reminder.repository.interface';

@Injectable()
export class TypeOrmReminderRepository
  extends TypeOrmRepository<Reminder, ReminderFilter>
  implements IReminderRepository
{
  protected readonly immutableColumns: ReadonlyArray<keyof Reminder> = [
    'id',
    'userId',
    'createdAt',
    'updatedAt',
  ];

  constructor(@InjectRepository(Reminder) repository: Repository<Reminder>) {
    super(repository);
  }

  protected toWhere(filter: ReminderFilter): FindOptionsWhere<Reminder> {
    const where: FindOptionsWhere<Reminder> = {};

    if (filter.id !== undefined) where.id = filter.id;
    if (filter.userId !== undefined) where.userId = filter.userId;
    if (filter.text !== undefined) where.text = filter.text;

    const date = this.toDateCondition(filter);
    if (date !== undefined) where.date = date;

    return where;
  }

  protected byId(id: string): FindOptionsWhere<Reminder> {
    return { id };
  }

  private toDateCondition(
    filter: ReminderFilter,
  ): string | FindOperator<string> | undefined {
    if (filter.date !== undefined) return filter.date;

    const { dateFrom, dateTo } = filter;
    if (dateFrom !== undefined && dateTo !== undefined) {
      return Between(dateFrom, dateTo);
    }
    if (dateFrom !== undefined) return MoreThanOrEqual(dateFrom);
    if (dateTo !== undefined) return LessThanOrEqual(dateTo);
    return undefined;
  }
}
