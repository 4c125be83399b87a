/**
 * ReminderController — REST API for the caller's reminders.
 *
 * Routes (X-User-Id required on all of them):
 *   GET    /api/v1/reminder/:id   → findOne
 *   GET    /api/v1/reminder       → findAll (query ?start_date=&end_date=)
 *   POST   /api/v1/reminder       → create
 *   DELETE /api/v1/reminder/:id   → remove
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiHeader,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CurrentUserId } from '../../common/decorator/customize';
import { USER_ID_HEADER_DISPLAY } from '../../common/constants/headers.constant';
import { ReminderService } from './services/reminder.service';
import { CreateReminderDto } from './dto/create-reminder.dto';
import { ReminderQueryDto } from './dto/reminder-query.dto';
import {
  DeleteReminderResponseDto,
  ReminderResponseDto,
} from './dto/reminder-response.dto';

const parseReminderId = new ParseUUIDPipe({
  errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
});

@ApiTags('Reminder')
@ApiHeader({
  name: USER_ID_HEADER_DISPLAY,
  required: true,
  description: 'Owner identifier (UUID)',
})
@Controller('reminder')
export class ReminderController {
  constructor(private readonly reminderService: ReminderService) {}

  @Get(':id')
  @ApiOkResponse({
    type: ReminderResponseDto,
    description: 'Reminder data retrieved successfully.',
  })
  @ApiNotFoundResponse({ description: 'Reminder not found.' })
  findOne(
    @CurrentUserId() userId: string,
    @Param('id', parseReminderId) id: string,
  ) {
    return this.reminderService.findOne(userId, id);
  }

  @Get()
  @ApiOkResponse({
    type: [ReminderResponseDto],
    description: 'Reminder data retrieved successfully.',
  })
  findAll(@CurrentUserId() userId: string, @Query() query: ReminderQueryDto) {
    return this.reminderService.findAll(userId, query);
  }

  @Post()
  @ApiCreatedResponse({
    type: ReminderResponseDto,
    description: 'Reminder created successfully.',
  })
  @ApiConflictResponse({ description: 'Reminder already exists.' })
  create(@CurrentUserId() userId: string, @Body() dto: CreateReminderDto) {
    return this.reminderService.create(userId, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({
    type: DeleteReminderResponseDto,
    description: 'Reminder deleted successfully.',
  })
  @ApiNotFoundResponse({ description: 'Reminder not found.' })
  remove(
    @CurrentUserId() userId: string,
    @Param('id', parseReminderId) id: string,
  ) {
    return this.reminderService.remove(userId, id);
  }
}
