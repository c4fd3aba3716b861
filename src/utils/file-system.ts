/**
 * File system operations - reading, writing, globbing and upward lookup.
 *
 * The compiler pipeline is synchronous end to end, so most helpers here
 * have a sync form. Config loading uses the async ones.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export function writeFileSync(filePath: string, content: string): void {
  ensureDirSync(path.dirname(filePath));
  fs.writeFileSync(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Check if a path is a directory.
 */
export function isDirectorySync(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

export function ensureDirSync(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns, sorted so that scans are deterministic.
 */
export function globFilesSync(
  patterns: string | string[],
  options: {
    cwd: string;
    ignore?: string[];
    absolute?: boolean;
  }
): string[] {
  const files = fg.sync(patterns, {
    cwd: options.cwd,
    ignore: options.ignore ?? ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    onlyFiles: true,
    dot: false,
  });
  return files.sort();
}

/**
 * Walk upward from `startDir` looking for `fileName`.
 * Returns the full path of the first match, or null at the filesystem root.
 */
export function findUpSync(fileName: string, startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, fileName);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Convert OS separators to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}
