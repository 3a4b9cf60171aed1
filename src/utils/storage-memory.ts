/**
 * In-Memory Storage Provider
 * Map-based file tree for tests and for running the pipeline on text that
 * never touches disk
 */

import * as nodePath from "path";
import type { StorageProvider } from "./storage.js";

const posix = nodePath.posix;

/**
 * In-memory implementation of StorageProvider
 *
 * Paths are POSIX-style. Directories exist implicitly once a file below them
 * is written, or explicitly after `mkdir`.
 *
 * @example
 * ```typescript
 * const storage = new InMemoryStorageProvider({
 *   '/raw/words_dict.txt': 'bula vinaka - hello',
 * });
 * await storage.listFiles('/raw'); // ['/raw/words_dict.txt']
 * ```
 */
export class InMemoryStorageProvider implements StorageProvider {
  private files: Map<string, string> = new Map();
  private directories: Set<string> = new Set(["/"]);

  constructor(initialFiles: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(initialFiles)) {
      this.put(path, content);
    }
  }

  readTextFile(path: string): Promise<string> {
    const content = this.files.get(posix.normalize(path));
    if (content === undefined) {
      return Promise.reject(
        new Error(`ENOENT: no such file or directory, open '${path}'`)
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, data: string): Promise<void> {
    this.put(path, data);
    return Promise.resolve();
  }

  mkdir(path: string): Promise<void> {
    this.addDirectory(posix.normalize(path));
    return Promise.resolve();
  }

  listFiles(root: string): Promise<string[]> {
    const normalizedRoot = posix.normalize(root);
    if (!this.directories.has(normalizedRoot)) {
      return Promise.reject(
        new Error(`ENOENT: no such file or directory, scandir '${root}'`)
      );
    }

    const prefix = normalizedRoot.endsWith("/")
      ? normalizedRoot
      : normalizedRoot + "/";
    const matches = [...this.files.keys()].filter((path) =>
      path.startsWith(prefix)
    );

    // Segment-wise ordering matches a depth-first walk with sorted entries
    matches.sort((a, b) => comparePaths(a, b));
    return Promise.resolve(matches);
  }

  /**
   * Current content of every stored file
   */
  snapshot(): Record<string, string> {
    return Object.fromEntries(this.files);
  }

  private put(path: string, content: string): void {
    const normalized = posix.normalize(path);
    this.files.set(normalized, content);
    this.addDirectory(posix.dirname(normalized));
  }

  private addDirectory(dir: string): void {
    let current = dir;
    while (!this.directories.has(current)) {
      this.directories.add(current);
      current = posix.dirname(current);
    }
  }
}

function comparePaths(a: string, b: string): number {
  const left = a.split("/");
  const right = b.split("/");
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? "";
    const y = right[i] ?? "";
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return left.length - right.length;
}
