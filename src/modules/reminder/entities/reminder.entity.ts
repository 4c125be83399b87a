import { Column, Entity, Index } from 'typeorm';
import { TimestampedEntity } from '../../../common/base/timestamped.entity';

@Entity('reminders')
@Index(['userId', 'date'])
export class Reminder extends TimestampedEntity {
  // Owner identifier (UUID text). Set on create, never changed afterwards.
  @Column({ name: 'user_id', type: 'varchar', length: 36 })
  userId!: string;

  // Calendar date, hydrated as 'YYYY-MM-DD'
  @Column({ type: 'date' })
  date!: string;

  @Column({ type: 'text' })
  text!: string;
}
