import { MediaEntry } from './Media';
import { PostReference } from '../value-objects/PostReference';
import { AppError, PipelineStage, getHttpStatus } from '../../shared/errors/AppError';

/**
 * Why one entry could not be saved
 */
export interface DownloadFailure {
  code: string;
  message: string;
  stage: PipelineStage;
  status?: number;
  url: string;
  timestamp: Date;
}

/**
 * Saved file information
 */
export interface DownloadedFile {
  path: string;
  filename: string;
  size: number; // in bytes
}

/**
 * Outcome of saving one media entry
 */
export class DownloadResult {
  private constructor(
    public readonly entry: MediaEntry,
    public readonly success: boolean,
    public readonly file?: DownloadedFile,
    public readonly error?: DownloadFailure
  ) {}

  static success(entry: MediaEntry, file: DownloadedFile): DownloadResult {
    return new DownloadResult(entry, true, file);
  }

  static failure(entry: MediaEntry, error: AppError): DownloadResult {
    return new DownloadResult(entry, false, undefined, {
      code: error.code,
      message: error.message,
      stage: error.stage,
      status: getHttpStatus(error),
      url: entry.source.url,
      timestamp: error.timestamp
    });
  }

  get path(): string | undefined {
    return this.file?.path;
  }

  get size(): number {
    return this.file?.size ?? 0;
  }
}

/**
 * Download metadata
 */
export interface DownloadMetadata {
  duration: number; // in milliseconds
  startedAt: Date;
  completedAt: Date;
  outputDir: string;
}

/**
 * Accounting of one post's downloads: successful paths and failures
 */
export class DownloadReport {
  constructor(
    public readonly post: PostReference,
    public readonly results: readonly DownloadResult[],
    public readonly metadata: DownloadMetadata
  ) {}

  /**
   * Paths of the saved files, in post order
   */
  get paths(): string[] {
    return this.results.flatMap(result => (result.file ? [result.file.path] : []));
  }

  get failures(): DownloadResult[] {
    return this.results.filter(result => !result.success);
  }

  get totalSize(): number {
    return this.results.reduce((sum, result) => sum + result.size, 0);
  }

  /**
   * A post without media, or with at least one saved file
   */
  get success(): boolean {
    return this.results.length === 0 || this.paths.length > 0;
  }

  /**
   * Check if download was partially successful
   */
  isPartialSuccess(): boolean {
    return this.paths.length > 0 && this.failures.length > 0;
  }

  /**
   * Get success rate as percentage
   */
  getSuccessRate(): number {
    const total = this.results.length;
    return total > 0 ? (this.paths.length / total) * 100 : 0;
  }
}
