// packages/core/src/util/ByteSource.ts
import { base64Decode } from './bytes.js';
import { SourceError } from '../errors/index.js';

export type SeekOrigin = 'start' | 'current' | 'end';

/**
 * Synchronous, seekable reader over a complete NCM container.
 *
 * Seeking past the end is allowed; reads there simply come back short
 * (possibly empty), the same as a file descriptor would behave.
 */
export interface SeekableSource {
  /** total length in bytes */
  readonly length: number;
  /** current read position */
  readonly position: number;
  /** move the read position, returning the new absolute position */
  seek(offset: number, origin?: SeekOrigin): number;
  /**
   * read up to `len` bytes from the current position and advance past them;
   * a short result means end-of-source
   */
  read(len: number): Uint8Array;
  /** release the underlying resource, if any */
  close?(): void;
}

export function isSeekableSource(input: unknown): input is SeekableSource {
  return (
    typeof input === 'object' &&
    input !== null &&
    typeof (input as SeekableSource).read === 'function' &&
    typeof (input as SeekableSource).seek === 'function'
  );
}

/** Resolve a seek request against the current position and total length. */
export function resolveSeek(
  position: number,
  length: number,
  offset: number,
  origin: SeekOrigin,
): number {
  const base = origin === 'start' ? 0 : origin === 'current' ? position : length;
  const next = base + offset;
  if (!Number.isSafeInteger(next) || next < 0) {
    throw new SourceError(`Invalid seek to ${next} (origin: ${origin}, offset: ${offset})`);
  }
  return next;
}

/**
 * In-memory source for Uint8Array | ArrayBuffer | Base64-encoded string.
 * Base64 text is decoded lazily, once, on first access.
 */
export class MemorySource implements SeekableSource {
  #buf: Uint8Array | null = null;
  #pos = 0;

  constructor(private readonly src: Uint8Array | ArrayBuffer | string) {}

  get length(): number {
    return this.bytes().byteLength;
  }

  get position(): number {
    return this.#pos;
  }

  seek(offset: number, origin: SeekOrigin = 'start'): number {
    this.#pos = resolveSeek(this.#pos, this.length, offset, origin);
    return this.#pos;
  }

  /** Returns a fresh copy; callers may mutate it. */
  read(len: number): Uint8Array {
    if (!Number.isSafeInteger(len) || len < 0) {
      throw new SourceError(`Invalid read length: ${len}`);
    }
    const data  = this.bytes();
    const start = Math.min(this.#pos, data.byteLength);
    const end   = Math.min(start + len, data.byteLength);
    this.#pos  += end - start;
    return data.slice(start, end);
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private bytes(): Uint8Array {
    if (!this.#buf) {
      if (this.src instanceof Uint8Array)       this.#buf = this.src;
      else if (this.src instanceof ArrayBuffer) this.#buf = new Uint8Array(this.src);
      else                                      this.#buf = base64Decode(this.src);
    }
    return this.#buf;
  }
}
