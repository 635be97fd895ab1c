import { execFile } from 'child_process';
import { FontCacheError, ServiceUnavailableError } from './errors.js';

/** Query target meaning "every font fontconfig knows about". */
export const ALL_FONTS = Symbol('all-fonts');

export type QueryTarget = readonly string[] | typeof ALL_FONTS;

export interface FontQueryService {
  query(target: QueryTarget): Promise<string>;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { timeoutMs: number }
) => Promise<string>;

// fontconfig unescapes the format itself: `\\` is one backslash handed to
// escape(), whose first character is the escape marker, and `\n` is a newline.
export const FONTCONFIG_FORMAT = String.raw`--format=%{file|escape(\\ ,)} %{family|escape(\\ )} %{slant} %{weight} %{width}\n`;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const execFileRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES, timeout: options.timeoutMs },
      (error, stdout, stderr) => {
        if (!error) {
          resolve(stdout);
          return;
        }
        let detail: string;
        if (error.code === 'ENOENT') detail = 'command not found';
        else if (error.killed) detail = `timed out after ${options.timeoutMs} ms`;
        else detail = stderr.trim() || error.message;
        reject(new ServiceUnavailableError(command, detail, { cause: error }));
      }
    );
  });

export interface FontconfigQueryOptions {
  fcQuery?: string;
  fcList?: string;
  /** 0 disables the deadline. */
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class FontconfigQueryService implements FontQueryService {
  private readonly fcQuery: string;
  private readonly fcList: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: FontconfigQueryOptions = {}) {
    this.fcQuery = options.fcQuery ?? 'fc-query';
    this.fcList = options.fcList ?? 'fc-list';
    this.timeoutMs = options.timeoutMs ?? 0;
    this.runner = options.runner ?? execFileRunner;
  }

  async query(target: QueryTarget): Promise<string> {
    if (target === ALL_FONTS) {
      return this.runner(this.fcList, [FONTCONFIG_FORMAT], { timeoutMs: this.timeoutMs });
    }
    if (target.length === 0) return '';
    return this.runner(this.fcQuery, [FONTCONFIG_FORMAT, ...target], { timeoutMs: this.timeoutMs });
  }
}

function terminate(chunk: string): string {
  return chunk.length === 0 || chunk.endsWith('\n') ? chunk : `${chunk}\n`;
}

async function runQuery(service: FontQueryService, target: QueryTarget): Promise<string> {
  try {
    return await service.query(target);
  } catch (error) {
    if (error instanceof FontCacheError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ServiceUnavailableError('font query', message, { cause: error });
  }
}

/**
 * Queries the bundled files and the whole system catalog and returns both
 * outputs as one stream. Ordering between the two does not matter downstream.
 */
export async function queryFontCatalog(service: FontQueryService, bundledFiles: readonly string[]): Promise<string> {
  const [bundled, system] = await Promise.all([
    runQuery(service, bundledFiles),
    runQuery(service, ALL_FONTS)
  ]);
  return terminate(bundled) + terminate(system);
}
