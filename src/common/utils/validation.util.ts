import type { ValidationError } from 'class-validator';

/**
 * Collect every constraint message from a class-validator error tree,
 * nested children included, without duplicates.
 */
export const flattenValidationErrors = (errors: ValidationError[]): string[] => {
  const messages = errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenValidationErrors(error.children ?? []),
  ]);
  return [...new Set(messages)];
};
