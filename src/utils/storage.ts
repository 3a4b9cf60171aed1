/**
 * Storage Abstraction Layer
 * Unified interface for the file operations the pipeline performs, so a run
 * can target the local file system or an in-memory tree
 */

/**
 * Storage provider interface
 * Implementations exist for Node.js (fs) and in-memory trees
 */
export interface StorageProvider {
  /**
   * Reads a file as UTF-8 text
   * Rejects if the file is missing, unreadable, or not valid UTF-8
   */
  readTextFile(path: string): Promise<string>;

  /**
   * Writes text to a file, replacing any existing content
   * Creates parent directories if they don't exist
   */
  writeFile(path: string, data: string): Promise<void>;

  /**
   * Creates a directory (and parent directories if needed)
   */
  mkdir(path: string): Promise<void>;

  /**
   * Lists every file below a directory, recursively
   * Directories themselves are not listed; symlinks to files are. Paths are returned joined onto
   * `root`, sorted so that a directory's entries come in name order.
   */
  listFiles(root: string): Promise<string[]>;
}
