import { describe, it, expect } from 'vitest';
import { Controller, Get } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Public } from '../decorator/customize';
import {
  InvalidUserIdException,
  MissingUserIdException,
} from '../errors/user-id.errors';
import { extractUserId, UserIdGuard } from './user-id.guard';

const USER_ID = '3f2b8c1e-6d4a-4e9b-9a7c-2f1e0d5b8a6c';

@Controller('scoped')
class ScopedController {
  @Get()
  list() {
    return [];
  }

  @Get('open')
  @Public()
  open() {
    return [];
  }
}

@Public()
@Controller('open')
class OpenController {
  @Get()
  status() {
    return 'ok';
  }
}

interface FakeRequest {
  headers: Record<string, string>;
  userId?: string;
}

const contextFor = (
  request: FakeRequest,
  controller: typeof ScopedController | typeof OpenController,
  handler: () => unknown,
) => new ExecutionContextHost([request, {}, () => undefined], controller, handler);

describe('extractUserId', () => {
  it('should return a well-formed UUID unchanged', () => {
    expect(extractUserId(USER_ID)).toBe(USER_ID);
  });

  it('should lower-case an upper-case UUID', () => {
    expect(extractUserId(USER_ID.toUpperCase())).toBe(USER_ID);
  });

  it('should throw MissingUserIdException when the header is absent or empty', () => {
    expect(() => extractUserId(undefined)).toThrow(MissingUserIdException);
    expect(() => extractUserId('')).toThrow(MissingUserIdException);
  });

  it('should throw InvalidUserIdException for a value that is not a UUID', () => {
    expect(() => extractUserId('user-1')).toThrow(InvalidUserIdException);
    expect(() => extractUserId([USER_ID, USER_ID])).toThrow(
      InvalidUserIdException,
    );
  });
});

describe('UserIdGuard', () => {
  const guard = new UserIdGuard(new Reflector());

  it('should attach the caller id to the request', () => {
    const request: FakeRequest = { headers: { 'x-user-id': USER_ID } };

    const allowed = guard.canActivate(
      contextFor(request, ScopedController, ScopedController.prototype.list),
    );

    expect(allowed).toBe(true);
    expect(request.userId).toBe(USER_ID);
  });

  it('should attach the lower-cased id for an upper-case header', () => {
    const request: FakeRequest = {
      headers: { 'x-user-id': USER_ID.toUpperCase() },
    };

    guard.canActivate(
      contextFor(request, ScopedController, ScopedController.prototype.list),
    );

    expect(request.userId).toBe(USER_ID);
  });

  it('should reject a scoped route without the header', () => {
    const request: FakeRequest = { headers: {} };

    expect(() =>
      guard.canActivate(
        contextFor(request, ScopedController, ScopedController.prototype.list),
      ),
    ).toThrow(MissingUserIdException);
  });

  it('should let a @Public() handler through without the header', () => {
    const request: FakeRequest = { headers: {} };

    expect(
      guard.canActivate(
        contextFor(request, ScopedController, ScopedController.prototype.open),
      ),
    ).toBe(true);
    expect(request.userId).toBeUndefined();
  });

  it('should let every handler of a @Public() controller through', () => {
    const request: FakeRequest = { headers: {} };

    expect(
      guard.canActivate(
        contextFor(request, OpenController, OpenController.prototype.status),
      ),
    ).toBe(true);
  });
});
