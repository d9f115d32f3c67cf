import type { BatchResult } from '@paysplit/model';

/**
 * Thrown when a systemic failure stops a batch midway.
 * Carries the statistics gathered before the failure.
 */
export class BatchAbortedError extends Error {
  public readonly name = 'BatchAbortedError';

  constructor(
    public readonly partialResult: BatchResult,
    public readonly pageIndex: number,
    cause: Error,
  ) {
    super(
      `Batch aborted at page ${pageIndex + 1} of ${partialResult.totalPages}: ${cause.message}`,
      { cause },
    );
  }
}
