import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Base Exception for Reminder Module
 */
export class ReminderException extends HttpException {
  constructor(message: string, status: HttpStatus) {
    super(message, status);
  }
}

export class ReminderNotFoundException extends ReminderException {
  constructor(message = 'Reminder not found.') {
    super(message, HttpStatus.NOT_FOUND);
  }
}

export class DuplicateReminderException extends ReminderException {
  constructor(message = 'Reminder already exists.') {
    super(message, HttpStatus.CONFLICT);
  }
}
