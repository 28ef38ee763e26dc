import { MediaEntry } from '../entities/Media';
import { DownloadResult } from '../entities/DownloadResult';

/**
 * Core interface for media downloaders
 */
export interface IMediaDownloader {
  /**
   * Save every entry under outputDir; one result per entry, in input order
   */
  download(
    entries: readonly MediaEntry[],
    outputDir: string,
    options?: DownloadOptions
  ): Promise<DownloadResult[]>;
}

/**
 * Options for downloading
 */
export interface DownloadOptions {
  concurrency?: number;
  progressInterval?: number; // in milliseconds
  progressCallback?: (progress: DownloadProgress) => void;
  headers?: Record<string, string>;
}

/**
 * Download progress information
 */
export interface DownloadProgress {
  filename: string;
  receivedBytes: number;
  totalBytes?: number;
  percentage?: number;
  done: boolean;
}
