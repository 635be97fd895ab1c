import { existsSync, readdirSync, realpathSync, statSync } from 'fs';
import { homedir } from 'os';
import { extname, join, resolve } from 'path';

const SYSTEM_FONT_EXTENSIONS = new Set(['.ttf', '.otf', '.ttc']);

/** `*.ttf` files directly inside `dir`, as sorted absolute paths. */
export function listBundledFonts(dir: string | undefined): string[] {
  if (!dir || !existsSync(dir)) return [];

  const root = resolve(dir);
  const out: string[] = [];
  for (const name of readdirSync(root)) {
    if (extname(name).toLowerCase() !== '.ttf') continue;
    const p = join(root, name);
    if (statSync(p).isFile()) out.push(p);
  }
  return out.sort();
}

export function systemFontDirs(platform: NodeJS.Platform = process.platform, home: string = homedir()): string[] {
  if (platform === 'win32') return ['C:\\Windows\\Fonts'];
  if (platform === 'darwin') return ['/System/Library/Fonts', '/Library/Fonts', join(home, 'Library', 'Fonts')];
  return ['/usr/share/fonts', '/usr/local/share/fonts', join(home, '.local', 'share', 'fonts'), join(home, '.fonts')];
}

function walk(dir: string, out: string[], visited: Set<string>): void {
  let names: string[];
  try {
    // symlinked directories may loop back; each real directory is read once
    const real = realpathSync(dir);
    if (visited.has(real)) return;
    visited.add(real);
    names = readdirSync(dir);
  } catch {
    // unreadable directories are not part of the catalog
    return;
  }

  for (const name of names) {
    const p = join(dir, name);
    let isDir = false;
    let isFile = false;
    try {
      const st = statSync(p);
      isDir = st.isDirectory();
      isFile = st.isFile();
    } catch {
      continue;
    }
    if (isDir) walk(p, out, visited);
    else if (isFile && SYSTEM_FONT_EXTENSIONS.has(extname(p).toLowerCase())) out.push(p);
  }
}

export function listSystemFontFiles(dirs: readonly string[] = systemFontDirs()): string[] {
  const out: string[] = [];
  const visited = new Set<string>();
  for (const d of dirs) {
    if (existsSync(d)) walk(d, out, visited);
  }
  return out.sort();
}
