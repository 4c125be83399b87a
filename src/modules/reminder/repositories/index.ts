export * from './reminder.repository.interface';
export * from './typeorm-reminder.repository';
