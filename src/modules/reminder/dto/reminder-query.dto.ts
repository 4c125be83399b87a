import { IsOptional } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsCalendarDate } from '../../../common/validators/is-calendar-date';

/**
 * DTO for GET /reminder?start_date=&end_date=
 * Both bounds are inclusive and optional.
 */
export class ReminderQueryDto {
  @ApiPropertyOptional({ example: '2024-01-01' })
  @IsOptional()
  @IsCalendarDate()
  start_date?: string;

  @ApiPropertyOptional({ example: '2024-01-31' })
  @IsOptional()
  @IsCalendarDate()
  end_date?: string;
}
