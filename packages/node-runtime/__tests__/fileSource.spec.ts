import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileSource } from '../src/FileSource.js';
import { SourceError } from '../../core/src/errors/index.js';

describe('FileSource', () => {
  let dir: string;
  let file: string;

  beforeAll(() => {
    dir  = mkdtempSync(join(tmpdir(), 'ncmkit-src-'));
    file = join(dir, 'data.bin');
    writeFileSync(file, Uint8Array.from({ length: 100 }, (_, i) => i));
  });

  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  it('reads sequentially from the current position', () => {
    const src = FileSource.open(file);
    try {
      expect(src.length).toBe(100);
      expect(Array.from(src.read(3))).toEqual([0, 1, 2]);
      src.seek(10, 'current');
      expect(Array.from(src.read(2))).toEqual([13, 14]);
      expect(src.position).toBe(15);
    } finally {
      src.close();
    }
  });

  it('returns short reads at end of file and empty reads past it', () => {
    const src = FileSource.open(file);
    try {
      src.seek(-2, 'end');
      expect(Array.from(src.read(10))).toEqual([98, 99]);
      src.seek(500);
      expect(src.read(4).byteLength).toBe(0);
    } finally {
      src.close();
    }
  });

  it('refuses use after close and tolerates double close', () => {
    const src = FileSource.open(file);
    src.close();
    src.close();
    expect(() => src.read(1)).toThrow(SourceError);
    expect(() => src.seek(0)).toThrow(SourceError);
  });

  it('wraps open failures in SourceError', () => {
    expect(() => FileSource.open(join(dir, 'missing.ncm'))).toThrow(SourceError);
  });
});
