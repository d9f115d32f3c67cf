import type { LoggerMethods } from '@paysplit/logger';

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PDFDocument } from 'pdf-lib';

/** Outcome of a merge */
export interface PdfMergeResult {
  outputPath: string;
  /** Inputs merged, in order */
  mergedFiles: string[];
  /** Inputs that did not exist */
  skippedFiles: string[];
  pageCount: number;
}

/**
 * Concatenate PDFs into one file, in the given order.
 *
 * Missing inputs are skipped with a warning; an input that is not a PDF fails
 * the merge.
 */
export async function mergePdfFiles(
  inputPaths: readonly string[],
  outputPath: string,
  logger: LoggerMethods,
): Promise<PdfMergeResult> {
  const merged = await PDFDocument.create();
  const mergedFiles: string[] = [];
  const skippedFiles: string[] = [];

  for (const inputPath of inputPaths) {
    if (!existsSync(inputPath)) {
      logger.warn(`[PdfMerger] File not found, skipping: ${inputPath}`);
      skippedFiles.push(inputPath);
      continue;
    }

    const source = await PDFDocument.load(await readFile(inputPath));
    const pages = await merged.copyPages(source, source.getPageIndices());
    for (const page of pages) {
      merged.addPage(page);
    }
    mergedFiles.push(inputPath);
  }

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, await merged.save());

  logger.info(
    `[PdfMerger] Merged ${mergedFiles.length} files (${merged.getPageCount()} pages) into ${outputPath}`,
  );
  return {
    outputPath,
    mergedFiles,
    skippedFiles,
    pageCount: merged.getPageCount(),
  };
}
