import { DownloadedFile } from '../entities/DownloadResult';

/**
 * Core interface for file storage operations
 */
export interface IFileStorage {
  /**
   * Create directory (and parents); resolves to its absolute path
   */
  createDirectory(path: string): Promise<string>;

  /**
   * Stream data into path. The bytes land in a temporary file that is
   * renamed into place on success and removed on failure.
   */
  save(path: string, data: NodeJS.ReadableStream, options?: SaveOptions): Promise<DownloadedFile>;

  /**
   * Check if file exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Delete file from storage
   */
  delete(path: string): Promise<void>;

  /**
   * Remove this tool's temporary files that an interrupted run left in
   * directory and nothing has written to for olderThanMs
   */
  removeStaleTemporaries(directory: string, olderThanMs?: number): Promise<string[]>;
}

/**
 * Options for saving files
 */
export interface SaveOptions {
  overwrite?: boolean;
  progressCallback?: (progress: SaveProgress) => void;
}

/**
 * Save progress information
 */
export interface SaveProgress {
  savedBytes: number;
}
