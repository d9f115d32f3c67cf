import type { Period } from '@paysplit/model';

import { PeriodValidationError } from '../errors/period-validation-error';

const YEAR_PATTERN = /^\d{4}$/;
const MONTH_PATTERN = /^\d{1,2}$/;

/**
 * Validate year/month input and build a Period.
 *
 * @param year - Four-digit year, e.g. "2024" or 2024
 * @param month - Month 1-12, with or without a leading zero
 * @throws PeriodValidationError on malformed input
 *
 * @example
 * ```typescript
 * parsePeriod('2024', '3'); // { year: 2024, month: 3 }
 * ```
 */
export function parsePeriod(year: string | number, month: string | number): Period {
  const yearText = String(year).trim();
  const monthText = String(month).trim();

  if (!YEAR_PATTERN.test(yearText)) {
    throw new PeriodValidationError(
      `Invalid year "${yearText}": expected four digits (yyyy)`,
    );
  }

  const monthValue = parseInt(monthText, 10);
  if (!MONTH_PATTERN.test(monthText) || monthValue < 1 || monthValue > 12) {
    throw new PeriodValidationError(
      `Invalid month "${monthText}": expected 1-12 (mm)`,
    );
  }

  return { year: parseInt(yearText, 10), month: monthValue };
}

/**
 * Period label used in output file names: `MM-YYYY`.
 */
export function formatPeriodLabel(period: Period): string {
  return `${String(period.month).padStart(2, '0')}-${String(period.year).padStart(4, '0')}`;
}
