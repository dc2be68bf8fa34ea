/**
 * Memory-backed files
 *
 * Materializes fuzz bytes as a real file for code under test that only takes
 * paths or descriptors. Files are written to a private directory on a
 * memory-backed filesystem (/dev/shm on Linux) and fall back to the OS temp
 * directory when that is unavailable.
 */

import { mkdtemp, open, rm, writeFile, type FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  ByteFillError,
  ErrorCode,
  type FuzzInput,
  type ReadError,
  type Result,
  ok,
  err,
} from '@bytefill/core';

const DIRECTORY_PREFIX = 'bytefill-';
const DEFAULT_FILE_NAME = 'input.bin';

export interface MemoryFileOptions {
  /** Candidate parent directories, tried in order (default: /dev/shm on Linux, then os.tmpdir()) */
  directories?: readonly string[];
  /** Name of the file inside its private directory (default: 'input.bin') */
  fileName?: string;
}

/**
 * Raised when no candidate directory could hold the file, the input was
 * empty, or the descriptor of a path-only file failed to close
 */
export class MemoryFileError extends ByteFillError {
  constructor(params: { message: string; path?: string; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.MEMORY_FILE_FAILED,
      context: params.path === undefined ? undefined : { path: params.path },
      cause: params.cause,
    });
  }
}

/**
 * An open, read-only file holding a copy of some fuzz bytes
 */
export class MemoryFile {
  private closed = false;

  constructor(
    readonly path: string,
    readonly directory: string,
    readonly handle: FileHandle,
    readonly size: number
  ) {}

  get fd(): number {
    return this.handle.fd;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Close the descriptor and remove the private directory. Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
    } finally {
      await rm(this.directory, { recursive: true, force: true });
    }
  }
}

export function defaultDirectories(): string[] {
  const candidates: string[] = [];
  if (process.platform === 'linux') {
    candidates.push('/dev/shm');
  }
  candidates.push(tmpdir());
  return candidates;
}

/**
 * Write `bytes` to a fresh file and open it read-only
 */
export async function createMemoryFile(
  bytes: Uint8Array,
  options: MemoryFileOptions = {}
): Promise<Result<MemoryFile, MemoryFileError>> {
  if (bytes.length === 0) {
    return err(new MemoryFileError({ message: 'empty input to memory file' }));
  }

  const directories = options.directories ?? defaultDirectories();
  const fileName = options.fileName ?? DEFAULT_FILE_NAME;
  let lastFailure: Error | undefined;

  for (const parent of directories) {
    try {
      return ok(await writeInto(parent, fileName, bytes));
    } catch (error) {
      lastFailure = toError(error);
      console.warn(
        `[bytefill] warning: cannot create memory file under ${parent} ` +
          `(${lastFailure.message}); trying next directory`
      );
    }
  }

  return err(
    new MemoryFileError({
      message: `could not create memory file in any of: ${directories.join(', ')}`,
      cause: lastFailure,
    })
  );
}

async function writeInto(
  parent: string,
  fileName: string,
  bytes: Uint8Array
): Promise<MemoryFile> {
  const directory = await mkdtemp(join(parent, DIRECTORY_PREFIX));
  const path = join(directory, fileName);
  try {
    await writeFile(path, bytes, { mode: 0o600 });
    const handle = await open(path, 'r');
    return new MemoryFile(path, directory, handle, bytes.length);
  } catch (error) {
    await rm(directory, { recursive: true, force: true });
    throw error;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Draw a length from the input's slice bounds, take that many bytes and
 * materialize them. The caller owns the returned file and must close it.
 */
export async function getFile(
  input: FuzzInput,
  options?: MemoryFileOptions
): Promise<Result<MemoryFile, ReadError | MemoryFileError>> {
  const bytes = input.getBytes();
  if (bytes.isErr()) return bytes;
  return createMemoryFile(bytes.value, options);
}

/**
 * Like getFile, but hands back only the path. The descriptor is closed; the
 * file stays on disk until the caller removes its directory.
 */
export async function getFilePath(
  input: FuzzInput,
  options?: MemoryFileOptions
): Promise<Result<string, ReadError | MemoryFileError>> {
  const file = await getFile(input, options);
  if (file.isErr()) return file;
  const { path, directory, handle } = file.value;
  try {
    await handle.close();
  } catch (error) {
    await rm(directory, { recursive: true, force: true });
    return err(
      new MemoryFileError({
        message: `could not close memory file ${path}`,
        path,
        cause: toError(error),
      })
    );
  }
  return ok(path);
}
