import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { SourceDocumentError } from '../errors/source-document-error';
import { backupSource } from './source-backup';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

describe('backupSource', () => {
  let workDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    workDir = await mkdtemp(join(tmpdir(), 'paysplit-backup-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  test('copies the source under a timestamped name', async () => {
    const sourcePath = join(workDir, 'march.pdf');
    await writeFile(sourcePath, 'source bytes');
    const backupDir = join(workDir, 'backup');

    const backupPath = await backupSource(
      sourcePath,
      backupDir,
      mockLogger,
      new Date(2024, 2, 31, 23, 59, 1),
    );

    expect(backupPath).toBe(join(backupDir, '20240331235901_march.pdf'));
    expect(await readFile(backupPath, 'utf8')).toBe('source bytes');
    expect(mockLogger.info).toHaveBeenCalledWith(
      `[SourceBackup] Backup created: ${backupPath}`,
    );
  });

  test('throws SourceDocumentError for a missing source', async () => {
    await expect(
      backupSource(join(workDir, 'none.pdf'), workDir, mockLogger),
    ).rejects.toBeInstanceOf(SourceDocumentError);
  });
});
