import type { LoggerMethods } from '@paysplit/logger';
import type { BatchResult, BatchStatus, Roster } from '@paysplit/model';

import type { Settings } from '../config/settings';
import type {
  PageProcessedCallback,
  ProgressCallback,
} from './batch-processor';

import {
  loadSettings,
  resolvePaths,
  settingsSchema,
  toProcessingOptions,
} from '../config/settings';
import { loadRosterFile } from '../roster/roster';
import { parsePeriod } from '../utils/period';
import { backupSource } from '../utils/source-backup';
import { BatchProcessor } from './batch-processor';

export interface SplitRequest {
  sourcePath: string;
  /** Four-digit year as typed by the operator */
  year: string | number;
  /** Month 1-12 as typed by the operator */
  month: string | number;
  roster: Roster;
  onProgress?: ProgressCallback;
  onPageProcessed?: PageProcessedCallback;
  isCancelled?: () => boolean;
  abortSignal?: AbortSignal;
}

export interface SplitOutcome {
  result: BatchResult;
  /** Copy of the source taken before the run, when backups are enabled */
  backupPath: string | null;
}

/**
 * Entry point wiring settings into a BatchProcessor.
 *
 * @example
 * ```typescript
 * const splitter = await PayslipSplitter.fromSettingsFile('settings.json', logger);
 * const roster = await splitter.loadRoster('roster.txt');
 * const { result } = await splitter.split({
 *   sourcePath: 'march.pdf',
 *   year: '2024',
 *   month: '03',
 *   roster,
 * });
 * ```
 */
export class PayslipSplitter {
  private readonly processor: BatchProcessor;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly settings: Settings = settingsSchema.parse({}),
    processor?: BatchProcessor,
  ) {
    const paths = resolvePaths(settings);
    this.processor =
      processor ??
      new BatchProcessor({
        logger,
        outputRoot: paths.outputDir,
        logsDir: paths.logsDir,
      });
  }

  static async fromSettingsFile(
    settingsPath: string,
    logger: LoggerMethods,
  ): Promise<PayslipSplitter> {
    return new PayslipSplitter(logger, await loadSettings(settingsPath, logger));
  }

  get status(): BatchStatus {
    return this.processor.status;
  }

  loadRoster(rosterPath: string): Promise<Roster> {
    return loadRosterFile(rosterPath, this.logger);
  }

  /**
   * Validate the period, back up the source if configured, and split it.
   */
  async split(request: SplitRequest): Promise<SplitOutcome> {
    const period = parsePeriod(request.year, request.month);

    const backupPath = this.settings.processing.backupOriginals
      ? await backupSource(
          request.sourcePath,
          resolvePaths(this.settings).backupDir,
          this.logger,
        )
      : null;

    const result = await this.processor.processBatch({
      sourcePath: request.sourcePath,
      period,
      roster: request.roster,
      options: toProcessingOptions(this.settings),
      onProgress: request.onProgress,
      onPageProcessed: request.onPageProcessed,
      isCancelled: request.isCancelled,
      abortSignal: request.abortSignal,
    });

    return { result, backupPath };
  }
}
