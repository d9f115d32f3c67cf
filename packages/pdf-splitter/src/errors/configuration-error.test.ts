import { describe, expect, test } from 'vitest';
import { z } from 'zod';

import { ConfigurationError } from './configuration-error';

describe('ConfigurationError', () => {
  test('should have correct name property', () => {
    expect(new ConfigurationError('bad').name).toBe('ConfigurationError');
  });

  test('fromZodError lists every issue with its path', () => {
    const schema = z.object({
      processing: z.object({ ocrThreshold: z.number().min(0) }),
    });
    const parsed = schema.safeParse({ processing: { ocrThreshold: -1 } });
    if (parsed.success) throw new Error('expected a validation failure');

    const error = ConfigurationError.fromZodError('Invalid settings', parsed.error);

    expect(error.message).toBe(
      'Invalid settings: processing.ocrThreshold: Number must be greater than or equal to 0',
    );
    expect(error.cause).toBe(parsed.error);
  });

  test('fromZodError names root issues', () => {
    const parsed = z.number().safeParse('x');
    if (parsed.success) throw new Error('expected a validation failure');

    const error = ConfigurationError.fromZodError('Invalid value', parsed.error);

    expect(error.message).toBe(
      'Invalid value: (root): Expected number, received string',
    );
  });
});
