import * as path from 'node:path';

import type { FileSystem } from './file-system.js';

function fsError(code: string, syscall: string, target: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: ${syscall} '${target}'`), { code });
}

/**
 * In-memory {@link FileSystem}.
 *
 * Paths are resolved with `path.resolve`, so relative paths land under the
 * process working directory just as they would on disk. Mirrors the errno
 * codes `node:fs` raises for the cases the store cares about.
 */
export class MemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();
  private readonly dirs = new Set<string>([path.parse(path.resolve('/')).root]);

  exists(filePath: string): boolean {
    const key = path.resolve(filePath);
    return this.files.has(key) || this.dirs.has(key);
  }

  readText(filePath: string): string {
    const key = path.resolve(filePath);
    if (this.dirs.has(key)) {
      throw fsError('EISDIR', 'read', key);
    }
    const content = this.files.get(key);
    if (content === undefined) {
      throw fsError('ENOENT', 'open', key);
    }
    return content;
  }

  writeText(filePath: string, content: string): void {
    const key = path.resolve(filePath);
    if (this.dirs.has(key)) {
      throw fsError('EISDIR', 'open', key);
    }
    if (!this.dirs.has(path.dirname(key))) {
      throw fsError('ENOENT', 'open', key);
    }
    this.files.set(key, content);
  }

  ensureDirectory(dirPath: string): void {
    const key = path.resolve(dirPath);
    const missing: string[] = [];
    let current = key;
    while (!this.dirs.has(current)) {
      if (this.files.has(current)) {
        throw fsError('ENOTDIR', 'mkdir', key);
      }
      missing.push(current);
      current = path.dirname(current);
    }
    for (const dir of missing) {
      this.dirs.add(dir);
    }
  }

  /** Absolute paths of every stored file, in creation order. */
  listFiles(): string[] {
    return Array.from(this.files.keys());
  }
}
