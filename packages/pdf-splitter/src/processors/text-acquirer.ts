import type { LoggerMethods } from '@paysplit/logger';
import type { AcquisitionMethod, ProcessingOptions } from '@paysplit/model';

import type { SourceDocument } from '../document/source-document';
import type { OcrEngine } from './tesseract-ocr-engine';

import { TesseractOcrEngine } from './tesseract-ocr-engine';

/** Options TextAcquirer reads */
export type TextAcquisitionOptions = Pick<
  ProcessingOptions,
  'ocrTextThreshold' | 'ocrUpscaleFactor' | 'ocrLanguage'
>;

/**
 * One way of reading a page's text.
 */
export interface PageTextStage {
  readonly method: AcquisitionMethod;
  read(
    document: SourceDocument,
    pageIndex: number,
    options: TextAcquisitionOptions,
  ): Promise<string>;
}

/** Text acquired for one page */
export interface AcquiredText {
  /** Possibly empty */
  text: string;

  /** Stage whose output `text` is */
  method: AcquisitionMethod;

  /** Stage failures, formatted for the batch error list */
  failures: string[];
}

/**
 * Reads the PDF text layer.
 */
export class DirectTextStage implements PageTextStage {
  readonly method = 'direct';

  read(document: SourceDocument, pageIndex: number): Promise<string> {
    return document.extractText(pageIndex);
  }
}

/**
 * Renders the page at the upscale factor and runs OCR on the bitmap.
 */
export class OcrTextStage implements PageTextStage {
  readonly method = 'ocr';

  constructor(private readonly engine: OcrEngine) {}

  async read(
    document: SourceDocument,
    pageIndex: number,
    options: TextAcquisitionOptions,
  ): Promise<string> {
    const image = await document.renderPage(pageIndex, options.ocrUpscaleFactor);
    return this.engine.recognize(image, options.ocrLanguage);
  }
}

/**
 * Stage overrides, mainly for tests and alternative OCR back ends
 */
export interface TextAcquirerStages {
  direct?: PageTextStage;
  ocr?: PageTextStage;
}

/**
 * Two-stage page text acquisition.
 *
 * The direct text layer is read first. When its trimmed length is below
 * `ocrTextThreshold` the page is treated as image-only and the OCR stage's
 * output replaces it. A failing stage never throws: the failure is logged,
 * reported in `failures`, and the stage contributes an empty string.
 */
export class TextAcquirer {
  private readonly direct: PageTextStage;
  private readonly ocr: PageTextStage;

  constructor(
    private readonly logger: LoggerMethods,
    stages: TextAcquirerStages = {},
  ) {
    this.direct = stages.direct ?? new DirectTextStage();
    this.ocr = stages.ocr ?? new OcrTextStage(new TesseractOcrEngine(logger));
  }

  /**
   * Acquire the text of one page.
   *
   * @param document - Open source document
   * @param pageIndex - 0-based page index
   * @param options - Threshold, upscale factor and OCR language
   */
  async acquire(
    document: SourceDocument,
    pageIndex: number,
    options: TextAcquisitionOptions,
  ): Promise<AcquiredText> {
    const failures: string[] = [];

    const directText = await this.runStage(
      this.direct,
      document,
      pageIndex,
      options,
      failures,
    );
    const directLength = directText.trim().length;

    if (directLength >= options.ocrTextThreshold) {
      return { text: directText, method: this.direct.method, failures };
    }

    this.logger.info(
      `[TextAcquirer] Page ${pageIndex + 1}: ${directLength} characters of direct text (< ${options.ocrTextThreshold}), trying OCR`,
    );

    const ocrText = await this.runStage(
      this.ocr,
      document,
      pageIndex,
      options,
      failures,
    );

    return { text: ocrText, method: this.ocr.method, failures };
  }

  private async runStage(
    stage: PageTextStage,
    document: SourceDocument,
    pageIndex: number,
    options: TextAcquisitionOptions,
    failures: string[],
  ): Promise<string> {
    try {
      return await stage.read(document, pageIndex, options);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const message = `Page ${pageIndex + 1}: ${stage.method} text acquisition failed: ${reason}`;
      this.logger.error(`[TextAcquirer] ${message}`);
      failures.push(message);
      return '';
    }
  }
}
