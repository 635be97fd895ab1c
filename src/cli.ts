#!/usr/bin/env node
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { format } from 'util';
import type { Writable } from 'stream';
import { isQueryBackend, parseTimeout } from './config.js';
import { FontCacheError } from './fonts/errors.js';
import { FontCacheGenerator, type FontCacheGeneratorOptions } from './index.js';
import type { FontCacheConfig, QueryBackend } from './types/config.js';
import type { FontCacheLogger } from './types/fonts.js';

const USAGE = `Usage: fontcache-gen <print|write> [options]

Build a font cache from fontconfig.

  print                   print the entries of the generated cache
  write                   write the cache to disk, replacing the old one

Options:
  --bundled-dir <dir>     directory of bundled *.ttf files to include
  --output <file>         cache file to write (default: platform cache dir)
  --backend <name>        fontconfig | fontkit
  --timeout <ms>          deadline for each font query, 0 for none
  -h, --help              show this help
`;

export type CliAction = 'print' | 'write';

export interface CliArgs {
  action?: CliAction;
  bundledDir?: string;
  output?: string;
  backend?: QueryBackend;
  timeoutMs?: number;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type Out = Pick<Writable, 'write'>;

function takeValue(argv: string[], i: number, flag: string): string {
  const v = argv[i + 1];
  if (v === undefined || v.startsWith('--')) throw new UsageError(`${flag} needs a value`);
  return v;
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '-h' || a === '--help') out.help = true;
    else if (a === '--bundled-dir') out.bundledDir = takeValue(argv, i++, a);
    else if (a === '--output') out.output = takeValue(argv, i++, a);
    else if (a === '--backend') {
      const v = takeValue(argv, i++, a);
      if (!isQueryBackend(v)) throw new UsageError(`Unknown backend: ${v}`);
      out.backend = v;
    } else if (a === '--timeout') {
      const v = takeValue(argv, i++, a);
      try {
        out.timeoutMs = parseTimeout(v, '--timeout');
      } catch (e) {
        throw new UsageError(e instanceof Error ? e.message : String(e));
      }
    } else if (a === 'print' || a === 'write') {
      if (out.action) throw new UsageError(`Only one action allowed, got ${out.action} and ${a}`);
      out.action = a;
    } else {
      throw new UsageError(`Unknown argument: ${a}`);
    }
  }

  return out;
}

function createLogger(stdout: Out, stderr: Out): FontCacheLogger {
  return {
    log: (...data: unknown[]) => stdout.write(`${format(...data)}\n`),
    warn: (...data: unknown[]) => stderr.write(`${format(...data)}\n`),
    error: (...data: unknown[]) => stderr.write(`${format(...data)}\n`)
  };
}

export async function run(
  argv: string[],
  io: { stdout: Out; stderr: Out } = { stdout: process.stdout, stderr: process.stderr },
  options: FontCacheGeneratorOptions = {}
): Promise<number> {
  const logger = options.logger ?? createLogger(io.stdout, io.stderr);

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    logger.error(e.message);
    io.stderr.write(USAGE);
    return 2;
  }

  if (args.help) {
    io.stdout.write(USAGE);
    return 0;
  }
  if (!args.action) {
    logger.error('Missing action: print or write');
    io.stderr.write(USAGE);
    return 2;
  }

  const config: Partial<FontCacheConfig> = {
    backend: args.backend,
    bundledFontsDir: args.bundledDir,
    cachePath: args.output,
    queryTimeoutMs: args.timeoutMs
  };

  try {
    const generator = new FontCacheGenerator(config, { ...options, logger });
    if (args.action === 'print') {
      await generator.print(io.stdout);
    } else {
      const path = await generator.write();
      logger.log(`Font cache written to ${path}`);
    }
    return 0;
  } catch (e) {
    if (e instanceof FontCacheError) {
      logger.error(`[${e.stage}] ${e.message}`);
      return 1;
    }
    logger.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMain()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      console.error(e);
      process.exit(1);
    });
}
