// packages/node-runtime/src/index.ts
export { openNcmFile } from './open.js';
export { FileSource } from './FileSource.js';
export { dumpNcmFile, type DumpOptions, type DumpResult } from './dump.js';
export * from '../../core/src/index.js';
