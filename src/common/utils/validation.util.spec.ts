import { describe, it, expect } from 'vitest';
import { ValidationError } from 'class-validator';
import { flattenValidationErrors } from './validation.util';

const validationError = (
  property: string,
  constraints?: Record<string, string>,
  children: ValidationError[] = [],
): ValidationError => {
  const error = new ValidationError();
  error.property = property;
  error.constraints = constraints;
  error.children = children;
  return error;
};

describe('flattenValidationErrors', () => {
  it('should return an empty list when there are no errors', () => {
    expect(flattenValidationErrors([])).toEqual([]);
  });

  it('should collect constraint messages in order, nested children included', () => {
    const errors = [
      validationError('date', {
        isCalendarDate: 'date must be a calendar date in YYYY-MM-DD format',
      }),
      validationError('meta', undefined, [
        validationError('tag', { isString: 'tag must be a string' }),
      ]),
      validationError('text', { isString: 'text must be a string' }),
    ];

    expect(flattenValidationErrors(errors)).toEqual([
      'date must be a calendar date in YYYY-MM-DD format',
      'tag must be a string',
      'text must be a string',
    ]);
  });

  it('should drop repeated messages', () => {
    const errors = [
      validationError('text', { isString: 'text must be a string' }),
      validationError('text', { isString: 'text must be a string' }),
    ];

    expect(flattenValidationErrors(errors)).toEqual(['text must be a string']);
  });
});
