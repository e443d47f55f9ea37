import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { dumpNcmFile, openNcmFile } from '../src/index.js';
import { InvalidFileTypeError } from '../../core/src/errors/index.js';
import {
  INFO_TAG,
  TEST_INFO,
  TEST_KEY,
  buildContainer,
  fakeFlac,
  fakeJpeg,
} from '../../core/__tests__/_fixture.js';

describe('dumpNcmFile', () => {
  let dir: string;

  beforeEach(() => { dir = mkdtempSync(join(tmpdir(), 'ncmkit-dump-')); });
  afterEach(() => rmSync(dir, { recursive: true, force: true }));

  const write = (name: string, bytes: Uint8Array) => {
    const p = join(dir, name);
    writeFileSync(p, bytes);
    return p;
  };

  it('writes the audio next to the input, named after the metadata format', () => {
    const input = write('track.ncm', buildContainer({ audio: fakeFlac(5000) }));
    const res   = dumpNcmFile(input);

    expect(res.audioPath).toBe(join(dir, 'track.flac'));
    expect(res.format).toBe('flac');
    expect(res.info?.name).toBe('寒鸦少年');
    expect(res.coverPath).toBeUndefined();
    expect(new Uint8Array(readFileSync(res.audioPath))).toEqual(fakeFlac(5000));
  });

  it('writes the cover into the requested directory', () => {
    const out   = mkdtempSync(join(dir, 'out-'));
    const input = write('track.ncm', buildContainer({ image: fakeJpeg(2048) }));
    const res   = dumpNcmFile(input, { outDir: out, cover: true });

    expect(res.audioPath).toBe(join(out, 'track.flac'));
    expect(res.coverPath).toBe(join(out, 'track.jpg'));
    expect(new Uint8Array(readFileSync(join(out, 'track.jpg')))).toEqual(fakeJpeg(2048));
  });

  it('skips an empty cover', () => {
    const input = write('bare.ncm', buildContainer({ image: new Uint8Array(0) }));
    const res   = dumpNcmFile(input, { cover: true });
    expect(res.coverPath).toBeUndefined();
    expect(existsSync(join(dir, 'bare.jpg'))).toBe(false);
  });

  it('falls back to the sniffed format when metadata is unreadable', () => {
    const sink: string[] = [];
    const input = write('broken.ncm', buildContainer({ infoText: INFO_TAG + '!!!!' }));
    const res   = dumpNcmFile(input, { logger: m => sink.push(m) });

    expect(res.format).toBe('flac');
    expect(res.info).toBeUndefined();
    expect(res.audioPath).toBe(join(dir, 'broken.flac'));
    expect(sink).toHaveLength(1);
    expect(sink[0]).toMatch(/^0\| broken\.ncm: metadata unreadable/);
  });

  it('ignores a metadata format that is not a plain extension', () => {
    const out   = mkdtempSync(join(dir, 'out-'));
    const sink: string[] = [];
    const input = write('evil.ncm', buildContainer({ info: { ...TEST_INFO, format: 'x/../../escaped' } }));
    const res   = dumpNcmFile(input, { outDir: out, logger: m => sink.push(m) });

    expect(res.format).toBe('flac');
    expect(res.audioPath).toBe(join(out, 'evil.flac'));
    expect(readdirSync(out)).toEqual(['evil.flac']);
    expect(existsSync(join(dir, 'escaped'))).toBe(false);
    expect(sink).toEqual(['0| evil.ncm: ignoring metadata format "x/../../escaped"']);
  });

  it('warns before overwriting an existing output', () => {
    const sink: string[] = [];
    const input = write('again.ncm', buildContainer({ audio: fakeFlac(300) }));
    write('again.flac', new Uint8Array([1, 2, 3]));

    dumpNcmFile(input, { logger: m => sink.push(m) });
    expect(sink).toEqual([`0| Overwriting existing file ${join(dir, 'again.flac')}`]);
    expect(new Uint8Array(readFileSync(join(dir, 'again.flac')))).toEqual(fakeFlac(300));
  });

  it('does not let the cover replace audio that shares its extension', () => {
    const sink: string[] = [];
    const input = write('clash.ncm', buildContainer({
      info : { ...TEST_INFO, format: 'jpg' },
      image: fakeJpeg(256),
      audio: fakeFlac(400),
    }));
    const res = dumpNcmFile(input, { cover: true, logger: m => sink.push(m) });

    expect(res.audioPath).toBe(join(dir, 'clash.jpg'));
    expect(res.coverPath).toBeUndefined();
    expect(new Uint8Array(readFileSync(res.audioPath))).toEqual(fakeFlac(400));
    expect(sink).toEqual([
      `0| clash.ncm: cover would overwrite the audio at ${join(dir, 'clash.jpg')}; skipped`,
    ]);
  });

  it('propagates container errors', () => {
    const input = write('fake.ncm', new TextEncoder().encode('definitely not an ncm file'));
    expect(() => dumpNcmFile(input)).toThrow(InvalidFileTypeError);
  });
});

describe('openNcmFile', () => {
  it('decodes straight from disk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'ncmkit-open-'));
    try {
      const p = join(dir, 'a.ncm');
      writeFileSync(p, buildContainer());
      const ncm = openNcmFile(p);
      try {
        expect(Array.from(ncm.getKey())).toEqual(Array.from(TEST_KEY));
        expect(ncm.getInfo().format).toBe('flac');
      } finally {
        ncm.close();
      }
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
