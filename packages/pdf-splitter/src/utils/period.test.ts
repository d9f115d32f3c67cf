import { describe, expect, test } from 'vitest';

import { PeriodValidationError } from '../errors/period-validation-error';
import { formatPeriodLabel, parsePeriod } from './period';

describe('parsePeriod', () => {
  test('parses string input', () => {
    expect(parsePeriod('2024', '03')).toEqual({ year: 2024, month: 3 });
  });

  test('parses numeric input and trims whitespace', () => {
    expect(parsePeriod(2023, ' 12 ')).toEqual({ year: 2023, month: 12 });
  });

  test.each(['24', '20245', 'abcd', ''])('rejects year %j', (year) => {
    expect(() => parsePeriod(year, '1')).toThrow(PeriodValidationError);
  });

  test.each(['0', '13', '1a', '', '001'])('rejects month %j', (month) => {
    expect(() => parsePeriod('2024', month)).toThrow(PeriodValidationError);
  });

  test('reports the offending value', () => {
    expect(() => parsePeriod('2024', '13')).toThrow(
      'Invalid month "13": expected 1-12 (mm)',
    );
  });
});

describe('formatPeriodLabel', () => {
  test('zero-pads the month', () => {
    expect(formatPeriodLabel({ year: 2024, month: 3 })).toBe('03-2024');
  });

  test('keeps two-digit months', () => {
    expect(formatPeriodLabel({ year: 2024, month: 11 })).toBe('11-2024');
  });
});
