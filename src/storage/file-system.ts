import * as fs from 'node:fs';

import { ConfigurationIOError, errorMessage } from '../errors.js';

/**
 * The filesystem capability the configuration store needs.
 *
 * Synchronous: every store operation completes within the call.
 * Implementations throw the underlying error (errno-style, with a `code`);
 * callers wrap it with {@link wrapIO}.
 */
export interface FileSystem {
  exists(filePath: string): boolean;
  readText(filePath: string): string;
  writeText(filePath: string, content: string): void;
  /** Create a directory and any missing parents. No-op if it exists. */
  ensureDirectory(dirPath: string): void;
}

/** {@link FileSystem} backed by `node:fs`. */
export class NodeFileSystem implements FileSystem {
  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  readText(filePath: string): string {
    return fs.readFileSync(filePath, 'utf8');
  }

  writeText(filePath: string, content: string): void {
    fs.writeFileSync(filePath, content, 'utf8');
  }

  ensureDirectory(dirPath: string): void {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Run one filesystem call, turning whatever it throws into a
 * {@link ConfigurationIOError} that names the action and path.
 */
export function wrapIO<T>(action: string, target: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new ConfigurationIOError(`Failed to ${action} ${target}: ${errorMessage(err)}`, target, {
      cause: err,
    });
  }
}
