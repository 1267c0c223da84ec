import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import {
  AppError,
  CalculationError,
  ConfigurationError,
  ErrorCategory,
  ErrorSeverity,
  ValidationError,
  errorMessage
} from '../errors';

const schema = z.object({ rate: z.number().max(1), plant: z.string() });

function zodErrorFor(value: unknown) {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    throw new Error('expected a validation failure');
  }
  return parsed.error;
}

describe('AppError', () => {
  test('defaults to an unknown error', () => {
    const error = new AppError('boom');

    expect(error.name).toBe('AppError');
    expect(error.severity).toBe(ErrorSeverity.ERROR);
    expect(error.category).toBe(ErrorCategory.UNKNOWN);
    expect(error.context).toEqual({});
    expect(error.toLogFormat()).toBe('[ERROR] [unknown] boom');
  });

  test('subclasses fix their category', () => {
    expect(new CalculationError('x').category).toBe(ErrorCategory.CALCULATION);
    expect(new ValidationError('x').severity).toBe(ErrorSeverity.WARNING);
    expect(new ConfigurationError('x').toLogFormat()).toBe('[CRITICAL] [configuration] x');
    expect(new ConfigurationError('x')).toBeInstanceOf(AppError);
  });
});

describe('fromZodError', () => {
  test('collects every issue into one configuration error', () => {
    const error = ConfigurationError.fromZodError(zodErrorFor({ rate: 2, plant: 7 }), { source: 'test' });

    expect(error.message).toBe(
      'Invalid analysis configuration: rate: Number must be less than or equal to 1; plant: Expected string, received number'
    );
    expect(error.context).toEqual({
      source: 'test',
      validationErrors: ['rate: Number must be less than or equal to 1', 'plant: Expected string, received number']
    });
  });

  test('uses the first issue as a validation message', () => {
    const error = ValidationError.fromZodError(zodErrorFor({ rate: 2, plant: 'PLANT-1' }));

    expect(error.message).toBe('rate: Number must be less than or equal to 1');
    expect(error.category).toBe(ErrorCategory.VALIDATION);
  });
});

describe('errorMessage', () => {
  test('reads errors and other thrown values', () => {
    expect(errorMessage(new Error('broken'))).toBe('broken');
    expect(errorMessage('plain')).toBe('plain');
  });
});
