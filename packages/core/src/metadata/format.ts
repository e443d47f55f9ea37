// packages/core/src/metadata/format.ts
import { FilesystemError } from '../errors/index.js';

export type AudioFormat = 'flac' | 'mp3' | 'ogg' | 'm4a' | 'wav';
export type ImageFormat = 'jpg' | 'png';

const startsWith = (buf: Uint8Array, sig: readonly number[], at = 0): boolean =>
  buf.length >= at + sig.length && sig.every((b, i) => buf[at + i] === b);

/** Guess the audio container from its leading bytes. */
export function sniffAudioFormat(buf: Uint8Array): AudioFormat | undefined {
  if (startsWith(buf, [0x66, 0x4c, 0x61, 0x43]))              return 'flac'; // fLaC
  if (startsWith(buf, [0x49, 0x44, 0x33]))                    return 'mp3';  // ID3
  if (buf.length >= 2 && buf[0] === 0xff && (buf[1] & 0xe0) === 0xe0) return 'mp3';
  if (startsWith(buf, [0x4f, 0x67, 0x67, 0x53]))              return 'ogg';  // OggS
  if (startsWith(buf, [0x66, 0x74, 0x79, 0x70], 4))           return 'm4a';  // ....ftyp
  if (startsWith(buf, [0x52, 0x49, 0x46, 0x46]) &&
      startsWith(buf, [0x57, 0x41, 0x56, 0x45], 8))           return 'wav';  // RIFF....WAVE
  return undefined;
}

export function sniffImageFormat(buf: Uint8Array): ImageFormat | undefined {
  if (startsWith(buf, [0xff, 0xd8, 0xff]))                       return 'jpg';
  if (startsWith(buf, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'png';
  return undefined;
}

export function mimeFromFormat(format: string): string {
  switch (format.toLowerCase()) {
    case 'mp3':
      return 'audio/mpeg';
    case 'flac':
      return 'audio/flac';
    case 'm4a':
      return 'audio/mp4';
    case 'aac':
      return 'audio/aac';
    case 'wav':
      return 'audio/wav';
    case 'ogg':
      return 'audio/ogg';
    case 'jpg':
    case 'jpeg':
      return 'image/jpeg';
    case 'png':
      return 'image/png';
    default:
      return 'application/octet-stream';
  }
}

const EXTENSION_RE = /^[a-z0-9]{1,8}$/i;

/** True for a short alphanumeric extension such as `flac` or `m4a`. */
export function isSafeExtension(format: string): boolean {
  return EXTENSION_RE.test(format);
}

/**
 * `song.ncm` + `flac` → `song.flac`. Directory parts are dropped; an
 * empty base falls back to `output`.
 * @throws FilesystemError if `format` is not a plain extension
 */
export function outputFileName(sourceName: string, format: string): string {
  if (!isSafeExtension(format)) {
    throw new FilesystemError(`Refusing output extension: ${JSON.stringify(format)}`);
  }
  const leaf = sourceName.split(/[\\/]/).pop() ?? '';
  const base = leaf.replace(/\.ncm$/i, '') || 'output';
  return `${base}.${format.toLowerCase()}`;
}
