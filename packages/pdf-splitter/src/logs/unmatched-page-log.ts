import type { LoggerMethods } from '@paysplit/logger';

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { UNMATCHED_PAGE_LOG } from '../config/constants';
import { TextNormalizer } from '../utils/text-normalizer';
import { formatLogTimestamp } from '../utils/timestamp';

/**
 * Sink for pages no roster entry matched.
 */
export interface UnmatchedPageSink {
  record(pageIndex: number, text: string): Promise<void>;
}

export interface UnmatchedPageLogOptions {
  logsDir: string;
  logger: LoggerMethods;
  clock?: () => Date;
}

/**
 * Appends one plain-text record per unmatched page to
 * `<logsDir>/unmatched_pages.log` so an operator can review it later.
 */
export class UnmatchedPageLog implements UnmatchedPageSink {
  public readonly filePath: string;
  private readonly logsDir: string;
  private readonly logger: LoggerMethods;
  private readonly clock: () => Date;

  constructor(options: UnmatchedPageLogOptions) {
    this.logsDir = options.logsDir;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.filePath = join(this.logsDir, UNMATCHED_PAGE_LOG.FILE_NAME);
  }

  async record(pageIndex: number, text: string): Promise<void> {
    await mkdir(this.logsDir, { recursive: true });
    await appendFile(
      this.filePath,
      formatUnmatchedRecord(this.clock(), pageIndex, text),
      'utf8',
    );
    this.logger.debug(
      `[UnmatchedPageLog] Recorded page ${pageIndex + 1} in ${this.filePath}`,
    );
  }
}

/**
 * One log record; the text is cut to its first 500 characters.
 */
export function formatUnmatchedRecord(
  at: Date,
  pageIndex: number,
  text: string,
): string {
  const preview = TextNormalizer.preview(
    text,
    UNMATCHED_PAGE_LOG.TEXT_PREVIEW_LENGTH,
  );
  return [
    `=== Unmatched page (${formatLogTimestamp(at)}) ===`,
    `Page number: ${pageIndex + 1}`,
    'Extracted text:',
    `${preview}...`,
    '',
    '',
  ].join('\n');
}
