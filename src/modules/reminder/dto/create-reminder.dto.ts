import { IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { IsCalendarDate } from '../../../common/validators/is-calendar-date';

export class CreateReminderDto {
  @ApiProperty({ description: 'Calendar date (YYYY-MM-DD)', example: '2024-01-01' })
  @IsCalendarDate()
  date!: string;

  @ApiProperty({ example: 'Renew passport' })
  @IsString()
  text!: string;
}
