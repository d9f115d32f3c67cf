/**
 * Payroll period a batch belongs to.
 *
 * Used only for output naming (`MM-YYYY`).
 */
export interface Period {
  /** Four-digit year */
  year: number;

  /** Month, 1-12 */
  month: number;
}
