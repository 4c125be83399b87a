import { ApiProperty } from '@nestjs/swagger';

export class ReminderResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ format: 'uuid' })
  user_id!: string;

  @ApiProperty({ example: '2024-01-01' })
  date!: string;

  @ApiProperty()
  text!: string;
}

export class DeleteReminderResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;
}
