import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Result of a spawn operation whose stdout is binary (e.g. a rendered PNG)
 */
export interface SpawnBufferResult {
  stdout: Buffer;
  stderr: string;
  code: number;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Data written to the child's stdin; stdin is closed afterwards
   */
  input?: Buffer | string;
}

function toBuffer(data: unknown): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(String(data));
}

function runProcess(
  command: string,
  args: string[],
  options: SpawnAsyncOptions,
): Promise<SpawnBufferResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    input,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdoutChunks: Buffer[] = [];
    let stderr = '';

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: unknown) => {
        stdoutChunks.push(toBuffer(data));
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: unknown) => {
        stderr += toBuffer(data).toString();
      });
    }

    proc.on('close', (code) => {
      resolve({ stdout: Buffer.concat(stdoutChunks), stderr, code: code ?? 0 });
    });

    proc.on('error', reject);

    if (input !== undefined && proc.stdin) {
      // EPIPE when the child exits before reading all input
      proc.stdin.on('error', reject);
      proc.stdin.end(input);
    }
  });
}

/**
 * Execute a command asynchronously and return its output as text
 *
 * @param command - The command to execute
 * @param args - Arguments to pass to the command
 * @param options - Spawn options with optional output capture control
 * @returns Promise resolving to stdout, stderr, and exit code
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdftotext', ['-f', '1', '-l', '1', 'batch.pdf', '-']);
 * console.log(result.stdout);
 *
 * // Feed stdin
 * const ocr = await spawnAsync('tesseract', ['stdin', 'stdout'], { input: png });
 * ```
 */
export async function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const result = await runProcess(command, args, options);
  return {
    stdout: result.stdout.toString('utf8'),
    stderr: result.stderr,
    code: result.code,
  };
}

/**
 * Execute a command asynchronously and keep stdout as raw bytes
 *
 * @example
 * ```typescript
 * const { stdout: png } = await spawnBuffer('magick', ['-density', '144', 'batch.pdf[0]', 'png:-']);
 * ```
 */
export function spawnBuffer(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnBufferResult> {
  return runProcess(command, args, options);
}
