import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable, Writable } from 'node:stream';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { spawnAsync, spawnBuffer } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

function createMockProcess(options?: {
  hasStdout?: boolean;
  hasStderr?: boolean;
  stdinChunks?: Buffer[];
}): ChildProcess {
  const emitter = new EventEmitter();
  const proc = emitter as unknown as ChildProcess;

  if (options?.hasStdout !== false) {
    proc.stdout = new Readable({ read() {} }) as ChildProcess['stdout'];
  } else {
    proc.stdout = null;
  }

  if (options?.hasStderr !== false) {
    proc.stderr = new Readable({ read() {} }) as ChildProcess['stderr'];
  } else {
    proc.stderr = null;
  }

  const stdinChunks = options?.stdinChunks;
  if (stdinChunks) {
    proc.stdin = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        stdinChunks.push(chunk);
        callback();
      },
    }) as ChildProcess['stdin'];
  } else {
    proc.stdin = null;
  }

  return proc;
}

describe('spawnAsync', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test('should execute command and capture stdout/stderr', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdftotext', ['-', '-']);

    proc.stdout!.emit('data', Buffer.from('JOÃO SILVA'));
    proc.stderr!.emit('data', Buffer.from('warning'));
    proc.emit('close', 0);

    const result = await promise;

    expect(spawnMock).toHaveBeenCalledWith('pdftotext', ['-', '-'], {});
    expect(result).toEqual({
      stdout: 'JOÃO SILVA',
      stderr: 'warning',
      code: 0,
    });
  });

  test('should decode a multi-byte character split across chunks', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const bytes = Buffer.from('Ã');
    const promise = spawnAsync('cmd', []);

    proc.stdout!.emit('data', bytes.subarray(0, 1));
    proc.stdout!.emit('data', bytes.subarray(1));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stdout).toBe('Ã');
  });

  test('should pass spawn options to child_process.spawn without capture flags', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('tesseract', ['--version'], {
      cwd: '/custom/path',
      env: { PATH: '/usr/bin' },
      captureStderr: false,
    });

    proc.emit('close', 0);

    await promise;

    expect(spawnMock).toHaveBeenCalledWith('tesseract', ['--version'], {
      cwd: '/custom/path',
      env: { PATH: '/usr/bin' },
    });
  });

  test('should write input to stdin', async () => {
    const stdinChunks: Buffer[] = [];
    const proc = createMockProcess({ stdinChunks });
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('tesseract', ['stdin', 'stdout'], {
      input: Buffer.from('png-bytes'),
    });

    proc.emit('close', 0);
    await promise;

    expect(Buffer.concat(stdinChunks).toString()).toBe('png-bytes');
  });

  test('should not capture stdout when captureStdout is false', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', [], { captureStdout: false });

    proc.stdout!.emit('data', Buffer.from('ignored'));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stdout).toBe('');
  });

  test('should not capture stderr when captureStderr is false', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', [], { captureStderr: false });

    proc.stderr!.emit('data', Buffer.from('ignored'));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stderr).toBe('');
  });

  test('should handle process without stdout or stderr streams', async () => {
    const proc = createMockProcess({ hasStdout: false, hasStderr: false });
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', []);

    proc.emit('close', 0);

    const result = await promise;

    expect(result).toEqual({ stdout: '', stderr: '', code: 0 });
  });

  test('should return 0 when exit code is null', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', []);

    proc.emit('close', null);

    const result = await promise;

    expect(result.code).toBe(0);
  });

  test('should return non-zero exit code', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', []);

    proc.emit('close', 1);

    const result = await promise;

    expect(result.code).toBe(1);
  });

  test('should reject on process error', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('nonexistent', []);

    proc.emit('error', new Error('spawn nonexistent ENOENT'));

    await expect(promise).rejects.toThrow('spawn nonexistent ENOENT');
  });
});

describe('spawnBuffer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test('should keep stdout as raw bytes', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnBuffer('magick', ['in.pdf[0]', 'png:-']);

    proc.stdout!.emit('data', Buffer.from([0x89, 0x50]));
    proc.stdout!.emit('data', Buffer.from([0x4e, 0x47]));
    proc.stderr!.emit('data', Buffer.from('note'));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stdout).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    expect(result.stderr).toBe('note');
    expect(result.code).toBe(0);
  });
});
