/**
 * PeriodValidationError
 *
 * Year or month input does not describe a payroll period.
 */
export class PeriodValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PeriodValidationError';
  }
}
