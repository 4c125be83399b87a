import { HttpException, HttpStatus } from '@nestjs/common';

export class MissingUserIdException extends HttpException {
  constructor() {
    super('Missing X-User-Id header.', HttpStatus.UNAUTHORIZED);
  }
}

export class InvalidUserIdException extends HttpException {
  constructor() {
    super('Invalid X-User-Id header.', HttpStatus.UNPROCESSABLE_ENTITY);
  }
}
