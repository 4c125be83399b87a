import {
  buildMessage,
  isISO8601,
  ValidateBy,
  ValidationOptions,
} from 'class-validator';

export const IS_CALENDAR_DATE = 'isCalendarDate';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * A calendar date with no time-of-day part, e.g. 2024-01-31.
 * Impossible dates such as 2023-02-29 are rejected.
 */
export const isCalendarDate = (value: unknown): value is string =>
  typeof value === 'string' &&
  CALENDAR_DATE_PATTERN.test(value) &&
  isISO8601(value, { strict: true });

export function IsCalendarDate(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_CALENDAR_DATE,
      validator: {
        validate: (value): boolean => isCalendarDate(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            eachPrefix + '$property must be a calendar date in YYYY-MM-DD format',
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
