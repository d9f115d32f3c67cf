import type { LoggerMethods } from '@paysplit/logger';

import { spawnAsync } from '@paysplit/shared';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/** qpdf exit code for "succeeded with warnings" */
const QPDF_EXIT_WARNINGS = 3;

/**
 * Password-protects PDFs with qpdf.
 *
 * AES-256, the same password as user and owner password. Printing and content
 * copying stay allowed; modification does not. The password reaches qpdf as
 * an `@-` argument file on stdin, so it never appears in the process list.
 *
 * ## System Requirements
 * - qpdf (`apt install qpdf` / `brew install qpdf`)
 */
export class DocumentSecurer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Write an encrypted copy of `inputPath` to `outputPath`.
   */
  async secure(
    inputPath: string,
    outputPath: string,
    password: string,
  ): Promise<void> {
    if (password.length === 0) {
      throw new Error('A password is required to secure a document');
    }
    if (/[\r\n]/.test(password)) {
      throw new Error('A document password cannot contain line breaks');
    }

    await mkdir(dirname(outputPath), { recursive: true });

    // One argument per line: user password, owner password
    const result = await spawnAsync(
      'qpdf',
      [
        inputPath,
        '--encrypt',
        '@-',
        '256',
        '--print=full',
        '--extract=y',
        '--modify=none',
        '--',
        outputPath,
      ],
      { input: `${password}\n${password}\n` },
    );

    if (result.code === QPDF_EXIT_WARNINGS) {
      this.logger.warn(
        `[DocumentSecurer] qpdf reported warnings for ${inputPath}: ${result.stderr.trim()}`,
      );
    } else if (result.code !== 0) {
      throw new Error(
        `qpdf failed to encrypt ${inputPath}: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    this.logger.info(`[DocumentSecurer] Encrypted ${inputPath} -> ${outputPath}`);
  }
}
