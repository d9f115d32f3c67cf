import type { LoggerMethods } from '@paysplit/logger';

import { spawnAsync } from '@paysplit/shared';

/**
 * Optical character recognition over a rendered page image.
 */
export interface OcrEngine {
  /**
   * @param image - PNG bytes
   * @param language - Tesseract language code(s), e.g. "por" or "por+eng"
   */
  recognize(image: Buffer, language: string): Promise<string>;
}

/**
 * OcrEngine running the Tesseract CLI, image on stdin and text on stdout.
 *
 * ## System Requirements
 * - Tesseract with the configured traineddata (`apt install tesseract-ocr tesseract-ocr-por`)
 */
export class TesseractOcrEngine implements OcrEngine {
  constructor(private readonly logger: LoggerMethods) {}

  async recognize(image: Buffer, language: string): Promise<string> {
    const result = await spawnAsync(
      'tesseract',
      ['stdin', 'stdout', '-l', language],
      { input: image },
    );

    if (result.code !== 0) {
      throw new Error(
        `tesseract failed (${language}): ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    this.logger.debug(
      `[TesseractOcrEngine] Recognized ${result.stdout.trim().length} characters (${language})`,
    );
    return result.stdout;
  }
}
