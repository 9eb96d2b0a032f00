import { closeSync, openSync, readSync } from 'fs';
import { StringDecoder } from 'string_decoder';
import { SmapsIoError } from '../errors';

/**
 * Pull-based line supplier with one line of lookahead. Both methods return
 * `undefined` once the input is exhausted and throw {@link SmapsIoError} when
 * the underlying input fails.
 */
export interface LineSource {
  peek(): string | undefined;
  next(): string | undefined;
}

const DEFAULT_CHUNK_SIZE = 64 * 1024;

const stripCarriageReturn = (line: string): string => (line.endsWith('\r') ? line.slice(0, -1) : line);

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

const toIoError = (error: unknown, filePath: string, action: string): SmapsIoError => {
  const code = errorCode(error);
  const reason = error instanceof Error ? error.message : String(error);
  return new SmapsIoError(`Failed to ${action} ${filePath}: ${reason}`, { path: filePath, code, cause: error });
};

class ArrayLineSource implements LineSource {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  peek(): string | undefined {
    return this.lines[this.index];
  }

  next(): string | undefined {
    const line = this.lines[this.index];
    if (line !== undefined) {
      this.index += 1;
    }
    return line;
  }
}

/**
 * Wraps text already in memory. A single trailing newline does not produce a
 * final empty line.
 */
export const createLineSource = (input: string | readonly string[]): LineSource => {
  if (typeof input !== 'string') {
    return new ArrayLineSource(input);
  }

  const lines = input.split('\n').map(stripCarriageReturn);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return new ArrayLineSource(lines);
};

/**
 * Reads a file in fixed-size chunks and hands it out line by line. The file
 * descriptor is released once the end of the file is reached, a read fails,
 * or `close()` is called.
 */
export class FileLineSource implements LineSource {
  private fd: number | undefined;
  private lines: string[] = [];
  private index = 0;
  private partial = '';
  private readonly decoder = new StringDecoder('utf8');
  private readonly chunk: Buffer;

  constructor(readonly path: string, chunkSize: number = DEFAULT_CHUNK_SIZE) {
    this.chunk = Buffer.alloc(chunkSize);
    try {
      this.fd = openSync(path, 'r');
    } catch (error) {
      throw toIoError(error, path, 'open');
    }
  }

  peek(): string | undefined {
    this.fill();
    return this.lines[this.index];
  }

  next(): string | undefined {
    this.fill();
    const line = this.lines[this.index];
    if (line !== undefined) {
      this.index += 1;
    }
    return line;
  }

  /** Releases the file; lines not yet handed out are discarded. */
  close(): void {
    this.lines = [];
    this.index = 0;
    this.partial = '';
    this.release();
  }

  private release(): void {
    if (this.fd === undefined) {
      return;
    }
    const fd = this.fd;
    this.fd = undefined;
    try {
      closeSync(fd);
    } catch (error) {
      throw toIoError(error, this.path, 'close');
    }
  }

  private fill(): void {
    while (this.index >= this.lines.length && this.fd !== undefined) {
      let bytesRead: number;
      try {
        bytesRead = readSync(this.fd, this.chunk, 0, this.chunk.length, null);
      } catch (error) {
        const readError = toIoError(error, this.path, 'read');
        this.release();
        throw readError;
      }

      this.lines = [];
      this.index = 0;

      if (bytesRead === 0) {
        const rest = this.partial + this.decoder.end();
        this.partial = '';
        if (rest.length > 0) {
          this.lines.push(stripCarriageReturn(rest));
        }
        this.release();
        return;
      }

      const pieces = (this.partial + this.decoder.write(this.chunk.subarray(0, bytesRead))).split('\n');
      this.partial = pieces.pop() ?? '';
      this.lines = pieces.map(stripCarriageReturn);
    }
  }
}

export const openLineSource = (filePath: string, chunkSize?: number): FileLineSource =>
  new FileLineSource(filePath, chunkSize);
