import type { LoggerMethods } from '@paysplit/logger';

import type { SourceDocument } from './source-document';

import { spawnAsync, spawnBuffer } from '@paysplit/shared';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';

import { TEXT_ACQUIRER } from '../config/constants';
import { SourceDocumentError } from '../errors/source-document-error';

/**
 * SourceDocument backed by a PDF file.
 *
 * - Page count and page copying: pdf-lib, in process
 * - Text layer: `pdftotext` (one page per call, `-layout`)
 * - Rendering: the page is copied out with pdf-lib and piped to ImageMagick
 *   `magick` on stdin, which writes PNG to stdout. The source path never
 *   reaches `magick`, so brackets or other filename syntax in it cannot
 *   select the wrong input.
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 * - ImageMagick + Ghostscript (`brew install imagemagick ghostscript`)
 */
export class PdfSourceDocument implements SourceDocument {
  public readonly pageCount: number;
  private document: PDFDocument | null;

  private constructor(
    public readonly sourcePath: string,
    document: PDFDocument,
    private readonly logger: LoggerMethods,
  ) {
    this.document = document;
    this.pageCount = document.getPageCount();
  }

  /**
   * Open a PDF for page-by-page processing.
   *
   * @throws SourceDocumentError `not-found` when the path does not exist,
   * `unreadable` when it cannot be read or parsed as a PDF
   */
  static async open(
    sourcePath: string,
    logger: LoggerMethods,
  ): Promise<PdfSourceDocument> {
    if (!existsSync(sourcePath)) {
      throw SourceDocumentError.notFound(sourcePath);
    }

    let document: PDFDocument;
    try {
      const bytes = await readFile(sourcePath);
      document = await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
      throw SourceDocumentError.unreadable(sourcePath, error);
    }

    const opened = new PdfSourceDocument(sourcePath, document, logger);
    logger.info(
      `[PdfSourceDocument] Opened ${sourcePath} (${opened.pageCount} pages)`,
    );
    return opened;
  }

  async extractText(pageIndex: number): Promise<string> {
    this.requirePage(pageIndex);
    const page = (pageIndex + 1).toString();

    const result = await spawnAsync('pdftotext', [
      '-f',
      page,
      '-l',
      page,
      '-layout',
      '-enc',
      'UTF-8',
      this.sourcePath,
      '-',
    ]);

    if (result.code !== 0) {
      throw new Error(
        `pdftotext failed for page ${page}: ${result.stderr || 'Unknown error'}`,
      );
    }

    return result.stdout;
  }

  async renderPage(pageIndex: number, scale: number): Promise<Buffer> {
    const density = Math.round(TEXT_ACQUIRER.BASE_DPI * scale);
    const pageBytes = await this.extractPages([pageIndex]);

    const result = await spawnBuffer(
      'magick',
      [
        '-density',
        density.toString(),
        'pdf:-',
        '-background',
        'white',
        '-alpha',
        'remove',
        '-alpha',
        'off',
        'png:-',
      ],
      { input: Buffer.from(pageBytes) },
    );

    if (result.code !== 0) {
      throw new Error(
        `magick failed to render page ${pageIndex + 1}: ${result.stderr || 'Unknown error'}`,
      );
    }
    if (result.stdout.length === 0) {
      throw new Error(`magick produced no image for page ${pageIndex + 1}`);
    }

    this.logger.debug(
      `[PdfSourceDocument] Rendered page ${pageIndex + 1} at ${density} DPI (${result.stdout.length} bytes)`,
    );
    return result.stdout;
  }

  async extractPages(pageIndices: readonly number[]): Promise<Uint8Array> {
    const source = this.requireDocument();
    for (const pageIndex of pageIndices) {
      this.requirePage(pageIndex);
    }

    const target = await PDFDocument.create();
    const copied = await target.copyPages(source, [...pageIndices]);
    for (const page of copied) {
      target.addPage(page);
    }
    return target.save();
  }

  async close(): Promise<void> {
    if (this.document) {
      this.document = null;
      this.logger.debug(`[PdfSourceDocument] Closed ${this.sourcePath}`);
    }
  }

  private requireDocument(): PDFDocument {
    if (!this.document) {
      throw SourceDocumentError.closed(this.sourcePath);
    }
    return this.document;
  }

  private requirePage(pageIndex: number): void {
    this.requireDocument();
    if (
      !Number.isInteger(pageIndex) ||
      pageIndex < 0 ||
      pageIndex >= this.pageCount
    ) {
      throw new RangeError(
        `Page index ${pageIndex} is out of range (0-${this.pageCount - 1})`,
      );
    }
  }
}
