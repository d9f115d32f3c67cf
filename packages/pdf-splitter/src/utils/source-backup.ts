import type { LoggerMethods } from '@paysplit/logger';

import { existsSync } from 'node:fs';
import { copyFile, mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { SourceDocumentError } from '../errors/source-document-error';
import { formatCompactTimestamp } from './timestamp';

/**
 * Copy the source document into `backupDir` as `<yyyyMMddHHmmss>_<name>`.
 *
 * @returns Path of the copy
 * @throws SourceDocumentError when the source does not exist
 */
export async function backupSource(
  sourcePath: string,
  backupDir: string,
  logger: LoggerMethods,
  now: Date = new Date(),
): Promise<string> {
  if (!existsSync(sourcePath)) {
    throw SourceDocumentError.notFound(sourcePath);
  }

  await mkdir(backupDir, { recursive: true });
  const backupPath = join(
    backupDir,
    `${formatCompactTimestamp(now)}_${basename(sourcePath)}`,
  );
  await copyFile(sourcePath, backupPath);

  logger.info(`[SourceBackup] Backup created: ${backupPath}`);
  return backupPath;
}
