// packages/node-runtime/src/dump.ts
import { existsSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import {
  InfoDecodeError,
  createLogger,
  isSafeExtension,
  outputFileName,
  sniffAudioFormat,
  sniffImageFormat,
  type Logger,
  type NcmInfo,
  type Verbosity,
} from '../../core/src/index.js';
import { openNcmFile } from './open.js';

function writeOutput(path: string, bytes: Uint8Array, log: Logger): void {
  if (existsSync(path)) log.log(0, `Overwriting existing file ${path}`);
  writeFileSync(path, bytes);
}

export interface DumpOptions {
  /** Target directory; defaults to the directory of the input file */
  outDir?  : string;
  /** Also write the embedded cover image next to the audio */
  cover?   : boolean;
  verbose? : Verbosity;
  logger?  : (msg: string) => void;
}

export interface DumpResult {
  audioPath : string;
  coverPath?: string;
  format    : string;
  /** `undefined` when the metadata block could not be decoded */
  info?     : NcmInfo;
}

/**
 * Decode one `.ncm` file to `<outDir>/<name>.<format>`.
 *
 * The format comes from the metadata record; when that block is unreadable,
 * or its format is not a plain extension, the audio magic is sniffed instead
 * and the dump still goes ahead.
 */
export function dumpNcmFile(input: string, opt: DumpOptions = {}): DumpResult {
  const log  = createLogger(opt.verbose ?? 0, opt.logger);
  const ncm  = openNcmFile(input, { verbose: opt.verbose, logger: opt.logger });
  const dir  = opt.outDir ?? dirname(input);

  try {
    let info: NcmInfo | undefined;
    try {
      info = ncm.getInfo();
    } catch (err) {
      if (!(err instanceof InfoDecodeError)) throw err;
      log.log(0, `${basename(input)}: metadata unreadable (${err.message}); sniffing format`);
    }

    let claimed = info?.format;
    if (claimed !== undefined && !isSafeExtension(claimed)) {
      log.log(0, `${basename(input)}: ignoring metadata format ${JSON.stringify(claimed)}`);
      claimed = undefined;
    }

    const audio  = ncm.getData();
    const format = claimed || sniffAudioFormat(audio) || 'mp3';

    const audioPath = join(dir, outputFileName(input, format));
    writeOutput(audioPath, audio, log);
    log.log(1, `Wrote ${audio.length} bytes to ${audioPath}`);

    const result: DumpResult = { audioPath, format };
    if (info) result.info = info;

    if (opt.cover) {
      const image = ncm.getImage();
      const ext   = sniffImageFormat(image);
      const coverPath = ext && join(dir, outputFileName(input, ext));
      if (image.length === 0 || !coverPath) {
        log.log(1, `${basename(input)}: no usable cover image`);
      } else if (coverPath === audioPath) {
        log.log(0, `${basename(input)}: cover would overwrite the audio at ${coverPath}; skipped`);
      } else {
        result.coverPath = coverPath;
        writeOutput(coverPath, image, log);
        log.log(1, `Wrote cover to ${coverPath}`);
      }
    }
    return result;
  } finally {
    ncm.close();
  }
}
