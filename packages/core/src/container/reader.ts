// packages/core/src/container/reader.ts
import { HEADER_SIZE, INFO_IMAGE_GAP, NCM_MAGIC } from '../config/defaults.js';
import {
  InvalidFileTypeError,
  InvalidImageLengthError,
  InvalidInfoLengthError,
  InvalidKeyLengthError,
  TruncatedSectionError,
  type NcmError,
} from '../errors/index.js';
import { readUint32LE } from '../util/bytes.js';
import type { SeekableSource } from '../util/ByteSource.js';
import type { ContainerSections, SectionDescriptor } from '../types/index.js';

/** True when the first 8 bytes carry the NCM magic. Never throws. */
export function isNcm(bytes: Uint8Array): boolean {
  if (bytes.length < 8) return false;
  return new DataView(bytes.buffer, bytes.byteOffset, 8).getBigUint64(0, true) === NCM_MAGIC;
}

function readLength(
  source: SeekableSource,
  onShort: (got: number) => NcmError,
): SectionDescriptor {
  const buf = source.read(4);
  if (buf.length !== 4) throw onShort(buf.length);
  return { start: source.position, length: readUint32LE(buf) };
}

/**
 * Validate the header and index the key, info and image sections.
 *
 * Only the length fields are read; section bodies are skipped with seeks.
 * The source position afterwards is unspecified.
 */
export function readContainer(source: SeekableSource): ContainerSections {
  const header = source.read(HEADER_SIZE);
  if (header.length !== HEADER_SIZE || !isNcm(header)) {
    throw new InvalidFileTypeError('Invalid input format. Not an NCM container.');
  }

  const key = readLength(source, n =>
    new InvalidKeyLengthError(`Key length field truncated (${n} of 4 bytes)`));
  source.seek(key.length, 'current');

  const info = readLength(source, n =>
    new InvalidInfoLengthError(`Info length field truncated (${n} of 4 bytes)`));
  source.seek(info.length + INFO_IMAGE_GAP, 'current');

  const image = readLength(source, n =>
    new InvalidImageLengthError(`Image length field truncated (${n} of 4 bytes)`));

  return { key, info, image };
}

export function audioStart(sections: ContainerSections): number {
  return sections.image.start + sections.image.length;
}

/**
 * Seek to a section and read exactly its bytes.
 * @throws {TruncatedSectionError} if the source ends inside the section.
 */
export function readSection(
  source: SeekableSource,
  section: SectionDescriptor,
  label: string,
): Uint8Array {
  source.seek(section.start, 'start');
  const bytes = source.read(section.length);
  if (bytes.length !== section.length) {
    throw new TruncatedSectionError(
      `${label} section truncated: expected ${section.length} bytes at ${section.start}, got ${bytes.length}`,
    );
  }
  return bytes;
}

/**
 * Seek to `start` and read everything up to end-of-source.
 * @throws {TruncatedSectionError} if `start` lies past the end.
 */
export function readToEnd(source: SeekableSource, start: number): Uint8Array {
  if (start > source.length) {
    throw new TruncatedSectionError(
      `Audio section starts at ${start}, past the end of the source (${source.length} bytes)`,
    );
  }
  source.seek(start, 'start');
  return source.read(source.length - start);
}
