// packages/core/src/index.ts

import { HEADER_KEY, KEY_TAG_LENGTH, KEY_XOR } from './config/defaults.js';
import { audioStart, readContainer, readSection, readToEnd } from './container/reader.js';
import { aes128EcbDecrypt } from './crypto/aesEcb.js';
import { KeyBox } from './crypto/KeyBox.js';
import { decryptAudio } from './crypto/keystream.js';
import { DecodingError, DecryptionError, InvalidFileTypeError } from './errors/index.js';
import { decodeInfoBlock } from './metadata/info.js';
import type { ContainerSections, NcmInfo } from './types/index.js';
import { MemorySource, isSeekableSource, type SeekableSource } from './util/ByteSource.js';
import { base64Decode, xorBytes } from './util/bytes.js';
import { createLogger, type Logger, type Verbosity } from './util/logger.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring NcmDump instance behavior.
 */
export interface NcmDumpOptions {
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose? : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?  : (msg: string) => void;
}

export type NcmInput = SeekableSource | Uint8Array | ArrayBuffer | string;

/** Base64 text that does not decode cannot be a container. */
function toBytes(input: Uint8Array | ArrayBuffer | string): Uint8Array | ArrayBuffer {
  if (typeof input !== 'string') return input;
  try {
    return base64Decode(input);
  } catch (err) {
    if (err instanceof DecodingError) {
      throw new InvalidFileTypeError(`Invalid input format. Not an NCM container (${err.message}).`);
    }
    throw err;
  }
}

/**
 * Handle over one NCM container.
 *
 * {@link NcmDump.open} validates the header and records section offsets once;
 * every getter then seeks straight to its section. The handle owns the
 * source: calls move its read position, so a handle must not be used from
 * two places at once.
 */
export class NcmDump {
  private readonly log: Logger;

  private constructor(
    private readonly source  : SeekableSource,
    private readonly layout  : ContainerSections,
    log: Logger,
  ) {
    this.log = log;
  }

  /**
   * Validate and index a container.
   * @param input - a seekable source, raw bytes, or Base64 text
   * @throws InvalidFileTypeError | InvalidKeyLengthError | InvalidInfoLengthError | InvalidImageLengthError
   */
  static open(input: NcmInput, opt: NcmDumpOptions = {}): NcmDump {
    const source = isSeekableSource(input) ? input : new MemorySource(toBytes(input));
    const log    = createLogger(opt.verbose ?? 0, opt.logger);

    log.log(2, `Indexing container (${source.length} bytes)`);
    const sections = readContainer(source);
    log.log(3,
      `Sections: key@${sections.key.start}+${sections.key.length}, ` +
      `info@${sections.info.start}+${sections.info.length}, ` +
      `image@${sections.image.start}+${sections.image.length}, ` +
      `audio@${audioStart(sections)}`);

    return new NcmDump(source, sections, log);
  }

  get sections(): ContainerSections { return this.layout; }

  /** Absolute offset of the audio payload; it runs to end-of-source. */
  get audioStart(): number { return audioStart(this.layout); }

  /** Adjust verbosity level of internal logger at runtime. */
  setVerbose(level: Verbosity): void { this.log.level = level; }
  getVerbose(): Verbosity            { return this.log.level; }

  /**
   * Unwrap the per-file audio key.
   * @throws DecryptionError if the key block does not decrypt or carries no key
   */
  getKey(): Uint8Array {
    const block = readSection(this.source, this.layout.key, 'Key');
    const plain = aes128EcbDecrypt(xorBytes(block, KEY_XOR), HEADER_KEY);
    if (plain.length <= KEY_TAG_LENGTH) {
      throw new DecryptionError(`Key block carries no key (${plain.length} plaintext bytes)`);
    }
    this.log.log(3, `Recovered ${plain.length - KEY_TAG_LENGTH}-byte audio key`);
    return plain.slice(KEY_TAG_LENGTH);
  }

  /**
   * Decode the metadata record.
   * @throws InfoDecodeError if the block is not in the expected shape
   */
  getInfo(): NcmInfo {
    const block = readSection(this.source, this.layout.info, 'Info');
    const info  = decodeInfoBlock(block);
    this.log.log(2, `Metadata: "${info.name}" (${info.format}, ${info.bitrate} bps)`);
    return info;
  }

  /** Raw cover image bytes; may be empty. */
  getImage(): Uint8Array {
    return readSection(this.source, this.layout.image, 'Image');
  }

  /** Decrypted audio stream (FLAC/MP3/...). */
  getData(): Uint8Array {
    const start = this.audioStart;
    const data  = readToEnd(this.source, start);
    this.log.log(2, `Decrypting ${data.length} audio bytes from offset ${start}`);

    const out = decryptAudio(data, KeyBox.fromKey(this.getKey()));
    this.log.log(1, 'Audio decryption finished');
    return out;
  }

  /** Release the underlying source. */
  close(): void {
    this.source.close?.();
  }
}

export { KeyBox } from './crypto/KeyBox.js';
export { decryptAudio, keystreamPeriod } from './crypto/keystream.js';
export { aes128EcbDecrypt } from './crypto/aesEcb.js';
export { readContainer, isNcm } from './container/reader.js';
export { decodeInfoBlock, parseInfo } from './metadata/info.js';
export {
  sniffAudioFormat,
  sniffImageFormat,
  mimeFromFormat,
  outputFileName,
  isSafeExtension,
  type AudioFormat,
  type ImageFormat,
} from './metadata/format.js';
export { base64Decode, base64Encode, concat, xorBytes } from './util/bytes.js';
export { MemorySource, type SeekableSource, type SeekOrigin } from './util/ByteSource.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export type { ArtistEntry, ContainerSections, NcmInfo, SectionDescriptor } from './types/index.js';
export * from './errors/index.js';
