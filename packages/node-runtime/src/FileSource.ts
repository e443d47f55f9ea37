// packages/node-runtime/src/FileSource.ts
import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import { SourceError } from '../../core/src/errors/index.js';
import {
  resolveSeek,
  type SeekOrigin,
  type SeekableSource,
} from '../../core/src/util/ByteSource.js';

/**
 * Seekable source over a file descriptor. Reads are positional
 * (`pread`-style), so nothing is buffered beyond what a caller asks for.
 */
export class FileSource implements SeekableSource {
  #fd : number | null;
  #pos = 0;

  private constructor(fd: number, readonly length: number, readonly path: string) {
    this.#fd = fd;
  }

  static open(path: string): FileSource {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (err) {
      throw new SourceError(`Cannot open ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    try {
      return new FileSource(fd, fstatSync(fd).size, path);
    } catch (err) {
      closeSync(fd);
      throw new SourceError(`Cannot stat ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  get position(): number {
    return this.#pos;
  }

  seek(offset: number, origin: SeekOrigin = 'start'): number {
    this.requireFd();
    this.#pos = resolveSeek(this.#pos, this.length, offset, origin);
    return this.#pos;
  }

  read(len: number): Uint8Array {
    const fd = this.requireFd();
    if (!Number.isSafeInteger(len) || len < 0) {
      throw new SourceError(`Invalid read length: ${len}`);
    }
    const want = Math.max(0, Math.min(len, this.length - this.#pos));
    const out  = new Uint8Array(want);

    let got = 0;
    while (got < want) {
      const n = readSync(fd, out, got, want - got, this.#pos + got);
      if (n === 0) break;
      got += n;
    }
    this.#pos += got;
    return got === want ? out : out.subarray(0, got);
  }

  /** always call after finishing */
  close(): void {
    if (this.#fd === null) return;
    closeSync(this.#fd);
    this.#fd = null;
  }

  private requireFd(): number {
    if (this.#fd === null) throw new SourceError(`FileSource already closed: ${this.path}`);
    return this.#fd;
  }
}
