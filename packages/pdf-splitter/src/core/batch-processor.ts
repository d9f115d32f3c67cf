import type { LoggerMethods } from '@paysplit/logger';
import type {
  BatchResult,
  BatchStatus,
  OutputArtifact,
  PageRecord,
  Period,
  ProcessingOptions,
  Roster,
} from '@paysplit/model';

import type { ProcessingOptionsInput } from '../config/processing-options';
import type {
  SourceDocument,
  SourceDocumentOpener,
} from '../document/source-document';
import type { UnmatchedPageSink } from '../logs/unmatched-page-log';

import { resolveProcessingOptions } from '../config/processing-options';
import { PdfSourceDocument } from '../document/pdf-source-document';
import { BatchAbortedError } from '../errors/batch-aborted-error';
import { PageRoutingError } from '../errors/page-routing-error';
import { UnmatchedPageLog } from '../logs/unmatched-page-log';
import { IdentityMatcher } from '../matchers/identity-matcher';
import { TextAcquirer } from '../processors/text-acquirer';
import { normalizeRoster } from '../roster/roster';
import { PageRouter } from '../routers/page-router';
import { parsePeriod } from '../utils/period';

/**
 * Called before each page with the 1-based page number and the page count
 */
export type ProgressCallback = (current: number, total: number) => void;

/**
 * Called after each page that was classified, whether or not it matched
 */
export type PageProcessedCallback = (record: PageRecord) => void;

export interface BatchProcessorOptions {
  logger: LoggerMethods;
  /** Root of the per-identity output directories */
  outputRoot: string;
  /** Directory of the unmatched-page log */
  logsDir: string;
  openDocument?: SourceDocumentOpener;
  textAcquirer?: Pick<TextAcquirer, 'acquire'>;
  identityMatcher?: Pick<IdentityMatcher, 'identify'>;
  pageRouter?: Pick<PageRouter, 'route'>;
  unmatchedLog?: UnmatchedPageSink;
}

export interface BatchRequest {
  /** Multi-page source PDF */
  sourcePath: string;
  period: Period;
  roster: Roster;
  options?: ProcessingOptionsInput;
  onProgress?: ProgressCallback;
  onPageProcessed?: PageProcessedCallback;
  /** Polled before each page */
  isCancelled?: () => boolean;
  /** Checked before each page, alongside `isCancelled` */
  abortSignal?: AbortSignal;
}

/** Mutable statistics of the running batch */
interface BatchTally {
  totalPages: number;
  processedPages: number;
  identifiedPages: number;
  unidentifiedPages: number;
  identitiesFound: Set<string>;
  artifacts: OutputArtifact[];
  errors: string[];
}

/**
 * BatchProcessor
 *
 * Splits one multi-page source document by identity:
 * acquire text → identify against the roster → route to the identity's
 * directory, or record the page in the unmatched-page log.
 *
 * Pages are visited in ascending order, one at a time. A failure confined to
 * one page is recorded in `errors` and the run continues; a routing failure
 * stops the run with BatchAbortedError. The source document is closed once on
 * every exit path.
 *
 * Status: `idle → running → completed | cancelled | failed`.
 */
export class BatchProcessor {
  private readonly logger: LoggerMethods;
  private readonly openDocument: SourceDocumentOpener;
  private readonly textAcquirer: Pick<TextAcquirer, 'acquire'>;
  private readonly identityMatcher: Pick<IdentityMatcher, 'identify'>;
  private readonly pageRouter: Pick<PageRouter, 'route'>;
  private readonly unmatchedLog: UnmatchedPageSink;
  private currentStatus: BatchStatus = 'idle';

  constructor(options: BatchProcessorOptions) {
    const { logger } = options;
    this.logger = logger;
    this.openDocument =
      options.openDocument ??
      ((sourcePath) => PdfSourceDocument.open(sourcePath, logger));
    this.textAcquirer = options.textAcquirer ?? new TextAcquirer(logger);
    this.identityMatcher =
      options.identityMatcher ?? new IdentityMatcher(logger);
    this.pageRouter =
      options.pageRouter ??
      new PageRouter({ outputRoot: options.outputRoot, logger });
    this.unmatchedLog =
      options.unmatchedLog ??
      new UnmatchedPageLog({ logsDir: options.logsDir, logger });
  }

  /** Status of the most recent run */
  get status(): BatchStatus {
    return this.currentStatus;
  }

  /**
   * Process every page of the source document.
   *
   * @returns Frozen statistics, with status `completed` or `cancelled`
   * @throws ConfigurationError for invalid options
   * @throws PeriodValidationError for an invalid period
   * @throws SourceDocumentError when the source is missing or unreadable
   * @throws BatchAbortedError when a page cannot be written; carries the
   * partial result
   */
  async processBatch(request: BatchRequest): Promise<BatchResult> {
    if (this.currentStatus === 'running') {
      throw new Error('A batch is already running on this processor');
    }

    const options = resolveProcessingOptions(request.options);
    const period = parsePeriod(request.period.year, request.period.month);
    const roster = normalizeRoster(request.roster);

    this.currentStatus = 'running';
    this.logger.info(
      `[BatchProcessor] Processing ${request.sourcePath} against ${roster.length} roster entries`,
    );

    let document: SourceDocument;
    try {
      document = await this.openDocument(request.sourcePath);
    } catch (error) {
      this.currentStatus = 'failed';
      this.logger.error(
        `[BatchProcessor] Cannot open ${request.sourcePath}:`,
        error,
      );
      throw error;
    }

    const tally: BatchTally = {
      totalPages: document.pageCount,
      processedPages: 0,
      identifiedPages: 0,
      unidentifiedPages: 0,
      identitiesFound: new Set(),
      artifacts: [],
      errors: [],
    };

    let pageIndex = 0;
    try {
      let cancelled = false;
      for (; pageIndex < tally.totalPages; pageIndex++) {
        if (this.isCancellationRequested(request)) {
          cancelled = true;
          this.logger.info(
            `[BatchProcessor] Cancelled before page ${pageIndex + 1} of ${tally.totalPages}`,
          );
          break;
        }

        request.onProgress?.(pageIndex + 1, tally.totalPages);
        await this.processPage(
          document,
          pageIndex,
          request,
          roster,
          period,
          options,
          tally,
        );
      }

      const status = cancelled ? 'cancelled' : 'completed';
      this.currentStatus = status;
      this.logger.info(
        `[BatchProcessor] Batch ${status}: ${tally.identifiedPages} identified, ${tally.unidentifiedPages} unidentified, ${tally.errors.length} errors`,
      );
      return toResult(status, tally);
    } catch (error) {
      this.currentStatus = 'failed';
      if (error instanceof PageRoutingError) {
        const aborted = new BatchAbortedError(
          toResult('failed', tally),
          pageIndex,
          error,
        );
        this.logger.error(`[BatchProcessor] ${aborted.message}`);
        throw aborted;
      }
      this.logger.error('[BatchProcessor] Batch failed:', error);
      throw error;
    } finally {
      await this.closeDocument(document);
    }
  }

  private isCancellationRequested(request: BatchRequest): boolean {
    return (
      request.abortSignal?.aborted === true || request.isCancelled?.() === true
    );
  }

  /**
   * Classify and route one page, recording per-page failures in the tally.
   * PageRoutingError propagates.
   */
  private async processPage(
    document: SourceDocument,
    pageIndex: number,
    request: BatchRequest,
    roster: Roster,
    period: Period,
    options: ProcessingOptions,
    tally: BatchTally,
  ): Promise<void> {
    tally.processedPages++;
    let counted = false;

    try {
      const acquired = await this.textAcquirer.acquire(
        document,
        pageIndex,
        options,
      );
      tally.errors.push(...acquired.failures);

      const match = this.identityMatcher.identify(
        acquired.text,
        roster,
        options,
      );
      const record: PageRecord = {
        pageIndex,
        text: acquired.text,
        acquisitionMethod: acquired.method,
        ...match,
      };

      if (match.identity === null) {
        tally.unidentifiedPages++;
        counted = true;
        this.logger.info(
          `[BatchProcessor] Page ${pageIndex + 1}: no identity (${acquired.method} text)`,
        );
        await this.unmatchedLog.record(pageIndex, acquired.text);
        request.onPageProcessed?.(record);
        return;
      }

      const artifact = await this.pageRouter.route(
        document,
        pageIndex,
        match.identity,
        period,
      );
      tally.identifiedPages++;
      counted = true;
      tally.identitiesFound.add(match.identity);
      tally.artifacts.push(artifact);
      this.logger.info(
        `[BatchProcessor] Page ${pageIndex + 1}: ${match.identity} (${match.method})`,
      );
      request.onPageProcessed?.(record);
    } catch (error) {
      if (error instanceof PageRoutingError) {
        throw error;
      }

      const reason = error instanceof Error ? error.message : String(error);
      const message = `Page ${pageIndex + 1}: ${reason}`;
      this.logger.error(`[BatchProcessor] ${message}`);
      tally.errors.push(message);
      if (!counted) {
        tally.unidentifiedPages++;
      }
    }
  }

  private async closeDocument(document: SourceDocument): Promise<void> {
    try {
      await document.close();
    } catch (error) {
      this.logger.error(
        `[BatchProcessor] Failed to close ${document.sourcePath}:`,
        error,
      );
    }
  }
}

function toResult(status: BatchResult['status'], tally: BatchTally): BatchResult {
  return Object.freeze({
    status,
    totalPages: tally.totalPages,
    processedPages: tally.processedPages,
    identifiedPages: tally.identifiedPages,
    unidentifiedPages: tally.unidentifiedPages,
    identitiesFound: Object.freeze([...tally.identitiesFound]),
    artifacts: Object.freeze([...tally.artifacts]),
    errors: Object.freeze([...tally.errors]),
  });
}
