/**
 * Node.js Storage Provider
 * Implements StorageProvider using Node.js fs/promises
 */

import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as nodePath from "path";
import type { StorageProvider } from "./storage.js";

/**
 * Node.js implementation of StorageProvider
 * Uses fs/promises for file operations
 */
export class NodeStorageProvider implements StorageProvider {
  /**
   * Reads a file as text, rejecting malformed UTF-8 instead of substituting
   * replacement characters
   */
  async readTextFile(path: string): Promise<string> {
    const buffer = await fs.readFile(path);
    const decoder = new TextDecoder("utf-8", { fatal: true });
    try {
      return decoder.decode(buffer);
    } catch (error) {
      throw new Error(`Invalid UTF-8 in ${path}`, { cause: error });
    }
  }

  /**
   * Writes data to a file
   */
  async writeFile(path: string, data: string): Promise<void> {
    // Ensure parent directory exists
    const dir = nodePath.dirname(path);
    await fs.mkdir(dir, { recursive: true });

    await fs.writeFile(path, data, "utf-8");
  }

  /**
   * Creates a directory
   */
  async mkdir(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
  }

  /**
   * Walks a directory tree depth-first
   * Symlinks to files are listed; symlinked directories are not entered.
   */
  async listFiles(root: string): Promise<string[]> {
    const files: string[] = [];
    const entries = await fs.readdir(root, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = nodePath.join(root, entry.name);
      if (entry.isDirectory()) {
        for (const file of await this.listFiles(fullPath)) {
          files.push(file);
        }
      } else if (entry.isFile() || (await this.isFileLink(entry, fullPath))) {
        files.push(fullPath);
      }
    }

    return files;
  }

  private async isFileLink(entry: Dirent, fullPath: string): Promise<boolean> {
    if (!entry.isSymbolicLink()) {
      return false;
    }
    try {
      return (await fs.stat(fullPath)).isFile();
    } catch (error) {
      // dangling link
      if (isNodeError(error) && error.code === "ENOENT") {
        return false;
      }
      throw error;
    }
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
