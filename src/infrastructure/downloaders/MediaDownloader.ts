import * as path from 'path';
import {
  IMediaDownloader,
  IHttpClient,
  IFileStorage,
  MediaEntry,
  DownloadResult,
  DownloadOptions,
  DownloadProgress,
  Filename
} from '../../domain';
import {
  AppError,
  ILogger,
  TransferError,
  WriteError,
  errorMessage,
  getHttpStatus
} from '../../shared';

export const DEFAULT_PROGRESS_INTERVAL = 500;

/**
 * Streams each media entry to `<outputDir>/twitter_<kind>_<unixSeconds>[_n].<ext>`.
 * One entry failing never stops the others.
 */
export class MediaDownloader implements IMediaDownloader {
  constructor(
    private readonly http: IHttpClient,
    private readonly storage: IFileStorage,
    private readonly logger: ILogger,
    private readonly clock: () => number = Date.now
  ) {}

  async download(
    entries: readonly MediaEntry[],
    outputDir: string,
    options: DownloadOptions = {}
  ): Promise<DownloadResult[]> {
    if (entries.length === 0) {
      return [];
    }

    let directory: string;
    try {
      directory = await this.storage.createDirectory(outputDir);
    } catch (error) {
      const failure = error instanceof AppError ? error : new WriteError(outputDir, errorMessage(error));
      this.logger.error(`Cannot prepare output directory ${outputDir}`, failure);
      return entries.map(entry => DownloadResult.failure(entry, failure));
    }

    await this.sweepTemporaries(directory);

    const results: DownloadResult[] = new Array(entries.length);
    const reserved = new Set<string>();
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

    // Process in batches
    for (let i = 0; i < entries.length; i += concurrency) {
      const batch = entries.slice(i, i + concurrency);
      await Promise.all(
        batch.map(async (entry, offset) => {
          results[i + offset] = await this.downloadEntry(entry, directory, reserved, options);
        })
      );
    }

    return results;
  }

  /**
   * Download one entry, turning every failure into a failed result
   */
  protected async downloadEntry(
    entry: MediaEntry,
    directory: string,
    reserved: Set<string>,
    options: DownloadOptions
  ): Promise<DownloadResult> {
    const url = entry.source.url;
    let filePath: string | undefined;

    try {
      filePath = await this.reservePath(entry, directory, reserved);
      const filename = path.basename(filePath);
      this.logger.info(`Downloading ${entry.kind}: ${url} -> ${filename}`);

      const response = await this.http.getStream(url, { headers: options.headers });
      const report = this.progressReporter(filename, response.contentLength, options);

      const file = await this.storage.save(filePath, response.body, {
        progressCallback: ({ savedBytes }) => report(savedBytes, false)
      });
      report(file.size, true);

      this.logger.info(`Saved ${file.path} (${file.size} bytes)`);
      return DownloadResult.success(entry, file);
    } catch (error) {
      if (filePath) {
        reserved.delete(path.basename(filePath));
      }
      const failure = this.toDownloadError(url, error);
      this.logger.error(`Failed to download ${entry.kind} #${entry.index}: ${url}`, failure);
      return DownloadResult.failure(entry, failure);
    }
  }

  /**
   * First free `twitter_<kind>_<ts>[_n].<ext>` in directory. A name is
   * claimed before anything is awaited, so concurrent entries of this
   * run never share one; names already on disk are skipped too.
   */
  protected async reservePath(entry: MediaEntry, directory: string, reserved: Set<string>): Promise<string> {
    const timestamp = Math.floor(this.clock() / 1000);
    const base = Filename.forMedia(entry.kind, timestamp, entry.getFileExtension());

    for (let counter = 0; ; counter++) {
      const filename = (counter === 0 ? base : base.withCounter(counter)).toString();
      if (reserved.has(filename)) continue;

      reserved.add(filename);
      const candidate = path.join(directory, filename);
      if (!(await this.storage.exists(candidate))) {
        return candidate;
      }
    }
  }

  /**
   * Progress callback limited to one report per interval, plus the final one
   */
  protected progressReporter(
    filename: string,
    totalBytes: number | undefined,
    options: DownloadOptions
  ): (receivedBytes: number, done: boolean) => void {
    const callback = options.progressCallback;
    const interval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    let lastReport: number | undefined;

    return (receivedBytes, done) => {
      if (!callback) return;

      const now = this.clock();
      if (!done && lastReport !== undefined && now - lastReport < interval) {
        return;
      }
      lastReport = now;

      const progress: DownloadProgress = { filename, receivedBytes, totalBytes, done };
      if (totalBytes) {
        progress.percentage = Math.min(100, Math.round((receivedBytes / totalBytes) * 100));
      }
      callback(progress);
    };
  }

  /**
   * Disk failures stay WriteErrors; everything else is a transfer failure
   * carrying the HTTP status when there was one
   */
  protected toDownloadError(url: string, error: unknown): AppError {
    if (error instanceof WriteError) {
      return error;
    }
    if (error instanceof AppError) {
      return new TransferError(url, error.message, getHttpStatus(error));
    }
    return new TransferError(url, errorMessage(error));
  }

  private async sweepTemporaries(directory: string): Promise<void> {
    try {
      await this.storage.removeStaleTemporaries(directory);
    } catch (error) {
      this.logger.warn(`Could not sweep temporary files in ${directory}`, { error: errorMessage(error) });
    }
  }
}
