import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommanderError } from 'commander';
import { createProgram, assertOutputDir } from '../src/program.js';
import { FilesystemError } from '../../core/src/errors/index.js';
import { buildContainer, fakeFlac, fakeJpeg } from '../../core/__tests__/_fixture.js';

/* ------------------------------------------------------------------ */
/*  In-process runner                                                  */
/* ------------------------------------------------------------------ */
function run(args: string[]) {
  const out: string[] = [];
  const err: string[] = [];
  const program = createProgram({ stdout: s => out.push(s), stderr: s => err.push(s) });
  program.exitOverride();
  const done = program.parseAsync(['node', 'ncmdump', ...args]);
  return { done, out, err };
}

describe('ncmdump (CLI)', () => {
  let dir: string;
  let track: string;

  beforeEach(() => {
    dir   = mkdtempSync(join(tmpdir(), 'ncmkit-cli-'));
    track = join(dir, 'song.ncm');
    writeFileSync(track, buildContainer({ image: fakeJpeg(128), audio: fakeFlac(4096) }));
  });

  afterEach(() => rmSync(dir, { recursive: true, force: true }));

  it('info prints the record and section layout as JSON', async () => {
    const { done, out } = run(['info', track]);
    await done;

    const meta = JSON.parse(out.join(''));
    expect(meta).toMatchObject({
      name   : '寒鸦少年',
      id     : 1305366556,
      format : 'flac',
      artist : [['华晨宇', 861777]],
    });
    expect(meta.sections.key).toEqual({ start: 14, length: 128 });
    expect(meta.sections.image.length).toBe(128);
    expect(meta.sections.audio.start).toBe(meta.sections.image.start + 128);
  });

  it('dump writes audio and cover', async () => {
    const { done, out } = run(['dump', track, '--cover']);
    await done;

    expect(out).toEqual([
      `${track} -> ${join(dir, 'song.flac')}\n`,
      `${track} -> ${join(dir, 'song.jpg')}\n`,
    ]);
    expect(new Uint8Array(readFileSync(join(dir, 'song.flac')))).toEqual(fakeFlac(4096));
    expect(new Uint8Array(readFileSync(join(dir, 'song.jpg')))).toEqual(fakeJpeg(128));
  });

  it('dump honours --out-dir', async () => {
    const out = mkdtempSync(join(dir, 'out-'));
    const { done } = run(['dump', track, '-o', out]);
    await done;
    expect(readFileSync(join(out, 'song.flac')).length).toBe(4096);
  });

  it('dump keeps going after a bad file and then fails', async () => {
    const bad = join(dir, 'bad.ncm');
    writeFileSync(bad, new TextEncoder().encode('not an ncm container'));

    const { done, out, err } = run(['dump', bad, track]);
    await expect(done).rejects.toBeInstanceOf(CommanderError);

    expect(err[0]).toBe(
      `${bad}: Error [InvalidFileTypeError]: Invalid input format. Not an NCM container.\n`,
    );
    expect(out).toEqual([`${track} -> ${join(dir, 'song.flac')}\n`]);
  });

  it('dump refuses a missing output directory', async () => {
    const { done } = run(['dump', track, '-o', join(dir, 'nope')]);
    await expect(done).rejects.toBeInstanceOf(FilesystemError);
  });

  it('-v routes log lines to stderr', async () => {
    const { done, err } = run(['-v', '-v', 'info', track]);
    await done;
    expect(err.some(l => l.startsWith('2| Indexing container'))).toBe(true);
    expect(err.some(l => l.startsWith('3| '))).toBe(false);
  });
});

describe('assertOutputDir', () => {
  it('rejects files and accepts directories', () => {
    const dir = mkdtempSync(join(tmpdir(), 'ncmkit-out-'));
    try {
      const file = join(dir, 'f.txt');
      writeFileSync(file, 'x');
      expect(() => assertOutputDir(file)).toThrow(FilesystemError);
      expect(assertOutputDir(dir)).toBe(dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
