import type { LoggerMethods } from '@paysplit/logger';
import type { OutputArtifact, Period } from '@paysplit/model';

import type { SourceDocument } from '../document/source-document';

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { PAGE_ROUTER } from '../config/constants';
import { PageRoutingError } from '../errors/page-routing-error';
import { formatPeriodLabel } from '../utils/period';
import { formatCompactTimestamp } from '../utils/timestamp';

/** Inclusive 0-based page range */
export type PageRange = readonly [start: number, end: number];

/** One page, or ranges concatenated in the given order */
export type PageSelection = number | readonly PageRange[];

export interface PageRouterOptions {
  /** Root under which one directory per identity is created */
  outputRoot: string;
  logger: LoggerMethods;
  /** Label between identity and period in file names */
  documentLabel?: string;
  /** Time source for the file name timestamp */
  clock?: () => Date;
}

const RESERVED_PATH_CHARACTERS = /[/\\:*?"<>|]/g;

/**
 * Writes pages of a source document to per-identity PDF files.
 *
 * Layout: `<outputRoot>/<identity>/<identity> - <label> - MM-YYYY_<timestamp>.pdf`.
 * Existing files are never overwritten; a taken name gets a `-2`, `-3`, ...
 * suffix before the extension.
 */
export class PageRouter {
  private readonly outputRoot: string;
  private readonly logger: LoggerMethods;
  private readonly documentLabel: string;
  private readonly clock: () => Date;

  constructor(options: PageRouterOptions) {
    this.outputRoot = options.outputRoot;
    this.logger = options.logger;
    this.documentLabel = options.documentLabel ?? PAGE_ROUTER.DOCUMENT_LABEL;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Copy the selected pages into a new file for `identity`.
   *
   * @throws PageRoutingError when nothing is selected, the identity cannot be
   * used as a directory name, or the file cannot be written
   */
  async route(
    document: SourceDocument,
    selection: PageSelection,
    identity: string,
    period: Period,
  ): Promise<OutputArtifact> {
    const pageIndices = resolvePageSelection(selection, document.pageCount);
    const segment = toPathSegment(identity);
    const pageList = pageIndices.map((index) => index + 1).join(', ');

    try {
      const directory = join(this.outputRoot, segment);
      await mkdir(directory, { recursive: true });

      const bytes = await document.extractPages(pageIndices);
      const baseName = `${segment} - ${this.documentLabel} - ${formatPeriodLabel(period)}_${formatCompactTimestamp(this.clock())}`;
      const fileName = await this.writeExclusive(directory, baseName, bytes);

      this.logger.info(
        `[PageRouter] Wrote ${fileName} (pages ${pageList}) for ${identity}`,
      );

      return {
        identity,
        path: join(directory, fileName),
        fileName,
        pageIndices,
      };
    } catch (error) {
      throw PageRoutingError.fromError(
        `Cannot route page(s) ${pageList} to ${identity}`,
        error,
      );
    }
  }

  private async writeExclusive(
    directory: string,
    baseName: string,
    bytes: Uint8Array,
  ): Promise<string> {
    for (let attempt = 1; attempt <= PAGE_ROUTER.MAX_NAME_ATTEMPTS; attempt++) {
      const suffix = attempt === 1 ? '' : `-${attempt}`;
      const fileName = `${baseName}${suffix}${PAGE_ROUTER.EXTENSION}`;
      try {
        await writeFile(join(directory, fileName), bytes, { flag: 'wx' });
        return fileName;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
        this.logger.debug(`[PageRouter] ${fileName} exists, trying next name`);
      }
    }

    throw new PageRoutingError(
      `No free file name for ${baseName} after ${PAGE_ROUTER.MAX_NAME_ATTEMPTS} attempts`,
    );
  }
}

/**
 * Resolve a selection into page indices.
 *
 * Ranges are clamped to `[0, pageCount - 1]`; a range empty after clamping
 * contributes nothing.
 *
 * @throws PageRoutingError when no page remains
 */
export function resolvePageSelection(
  selection: PageSelection,
  pageCount: number,
): number[] {
  if (typeof selection === 'number') {
    if (!Number.isInteger(selection) || selection < 0 || selection >= pageCount) {
      throw new PageRoutingError(
        `Page ${selection + 1} is outside the document (1-${pageCount})`,
      );
    }
    return [selection];
  }

  const indices: number[] = [];
  for (const [start, end] of selection) {
    const first = Math.max(0, Math.ceil(start));
    const last = Math.min(pageCount - 1, Math.floor(end));
    for (let index = first; index <= last; index++) {
      indices.push(index);
    }
  }

  if (indices.length === 0) {
    throw new PageRoutingError(
      `No pages left after clamping ranges to the document (1-${pageCount})`,
    );
  }
  return indices;
}

/**
 * Directory-safe form of an identity: reserved characters become `_`.
 *
 * @throws PageRoutingError when nothing usable remains
 */
export function toPathSegment(identity: string): string {
  const segment = identity.replace(RESERVED_PATH_CHARACTERS, '_').trim();
  if (segment === '' || /^\.+$/.test(segment)) {
    throw new PageRoutingError(
      `Identity "${identity}" cannot be used as a directory name`,
    );
  }
  return segment;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
