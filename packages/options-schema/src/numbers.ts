import { z } from 'zod';

const INTEGER_MESSAGE = 'Value must be an integer.';

/**
 * Integer option constrained to `[min, max]`, matching the option ranges the
 * host exposes to players.
 */
export const boundedIntegerSchema = (min: number, max: number) =>
  z
    .number({ invalid_type_error: 'Value must be a number.' })
    .int({ message: INTEGER_MESSAGE })
    .min(min, { message: `Value must be between ${min} and ${max}.` })
    .max(max, { message: `Value must be between ${min} and ${max}.` });

export const positiveIntSchema = z
  .number()
  .int({ message: INTEGER_MESSAGE })
  .positive({ message: 'Value must be a positive integer greater than 0.' });

export const integerSchema = z.number().int({ message: INTEGER_MESSAGE });
