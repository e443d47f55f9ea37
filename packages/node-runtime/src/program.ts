// packages/node-runtime/src/program.ts
import { Command, Option } from 'commander';
import { accessSync, constants as fsConstants, existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import { FilesystemError } from '../../core/src/errors/index.js';
import { toVerbosity } from '../../core/src/util/logger.js';
import { dumpNcmFile } from './dump.js';
import { openNcmFile } from './open.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

export interface ProgramIO {
  stdout: (s: string) => void;
  stderr: (s: string) => void;
}

const defaultIO: ProgramIO = {
  stdout: s => { process.stdout.write(s); },
  stderr: s => { process.stderr.write(s); },
};

interface GlobalOpts {
  verbose: number;
}

export function assertOutputDir(dir: string): string {
  const abs = resolve(dir);
  if (!existsSync(abs)) {
    throw new FilesystemError(`Output directory does not exist: ${abs}`);
  }
  if (!statSync(abs).isDirectory()) {
    throw new FilesystemError(`Output path is not a directory: ${abs}`);
  }
  try {
    accessSync(abs, fsConstants.W_OK);
  } catch {
    throw new FilesystemError(`Output directory is not writeable: ${abs}`);
  }
  return abs;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `Error [${err.name}]: ${err.message}`;
  return `Error [Unknown]: ${String(err)}`;
}

/**
 * Build the `ncmdump` command tree. `io` receives everything the commands
 * print, so the program can run in-process.
 */
export function createProgram(io: ProgramIO = defaultIO): Command {
  const program = new Command();

  program
    .name('ncmdump')
    .version(PKG_VERSION)
    .description('Decode NCM containers into their audio, cover art and metadata')
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_, previous: number) => previous + 1)
    );

  const logger = (msg: string) => io.stderr(msg + '\n');
  const verbosity = () => toVerbosity(program.opts<GlobalOpts>().verbose);

  program
    .command('info <file>')
    .description('Print the decoded metadata record and section layout as JSON')
    .action((file: string) => {
      const ncm = openNcmFile(file, { verbose: verbosity(), logger });
      try {
        const info = ncm.getInfo();
        const out  = {
          ...info,
          sections: { ...ncm.sections, audio: { start: ncm.audioStart } },
        };
        io.stdout(JSON.stringify(out, null, 2) + '\n');
      } finally {
        ncm.close();
      }
    });

  program
    .command('dump <files...>')
    .description('Decrypt each file to <name>.<format> (flac, mp3, ...)')
    .option('-o, --out-dir <dir>', 'output directory (default: next to each input)')
    .option('--cover', 'also write the embedded cover image', false)
    .action((files: string[], cmd: { outDir?: string; cover: boolean }) => {
      const outDir = cmd.outDir === undefined ? undefined : assertOutputDir(cmd.outDir);

      let failed = 0;
      for (const file of files) {
        try {
          const res = dumpNcmFile(file, {
            outDir,
            cover  : cmd.cover,
            verbose: verbosity(),
            logger,
          });
          io.stdout(`${file} -> ${res.audioPath}\n`);
          if (res.coverPath) io.stdout(`${file} -> ${res.coverPath}\n`);
        } catch (err) {
          failed++;
          io.stderr(`${file}: ${describeError(err)}\n`);
        }
      }

      if (failed > 0) {
        program.error(`${failed} of ${files.length} file(s) failed`, { exitCode: 1 });
      }
    });

  return program;
}
