// packages/node-runtime/src/open.ts
import { NcmDump, type NcmDumpOptions } from '../../core/src/index.js';
import { FileSource } from './FileSource.js';

/** Open an `.ncm` file; the returned handle owns (and closes) the descriptor. */
export function openNcmFile(path: string, cfg?: NcmDumpOptions): NcmDump {
  const src = FileSource.open(path);
  try {
    return NcmDump.open(src, cfg);
  } catch (err) {
    src.close();
    throw err;
  }
}
