import {
  IPageFetcher,
  IMediaExtractor,
  IMediaDownloader,
  DownloadOptions,
  DownloadReport
} from '../../domain';
import { ILogger, InvalidUrlError } from '../../shared';

export const DEFAULT_OUTPUT_DIR = './downloads';

/**
 * Download from URL use case request
 */
export interface DownloadFromUrlRequest extends DownloadOptions {
  url: string;
  outputDir?: string;
}

/**
 * Runs fetch, extract and download for one post. Failures of the first
 * two stages propagate; per-entry download failures end up in the report.
 */
export class DownloadFromUrlUseCase {
  constructor(
    private readonly fetcher: IPageFetcher,
    private readonly extractor: IMediaExtractor,
    private readonly downloader: IMediaDownloader,
    private readonly logger: ILogger
  ) {}

  /**
   * Execute the use case
   */
  async execute(request: DownloadFromUrlRequest): Promise<DownloadReport> {
    const { url, outputDir = DEFAULT_OUTPUT_DIR, ...options } = request;
    if (!url || !url.trim()) {
      throw new InvalidUrlError(url, 'URL is required');
    }

    const startedAt = new Date();
    this.logger.info('Starting media download', { url, outputDir });

    const content = await this.fetcher.fetch(url);
    const entries = this.extractor.extract(content);
    const results = await this.downloader.download(entries, outputDir, options);

    const completedAt = new Date();
    const report = new DownloadReport(content.post, results, {
      duration: completedAt.getTime() - startedAt.getTime(),
      startedAt,
      completedAt,
      outputDir
    });

    if (results.length === 0) {
      this.logger.info('Post has no media', { post: content.post.id });
    } else if (report.failures.length === 0) {
      this.logger.info('Download completed successfully', {
        files: report.paths.length,
        totalSize: report.totalSize,
        duration: report.metadata.duration
      });
    } else {
      this.logger.warn(`${report.failures.length} of ${results.length} download(s) failed`, {
        failures: report.failures.map(result => result.error?.message)
      });
    }

    return report;
  }

  /**
   * Paths of the files saved for a post, in post order
   */
  async downloadFromUrl(url: string, outputDir: string = DEFAULT_OUTPUT_DIR): Promise<string[]> {
    const report = await this.execute({ url, outputDir });
    return report.paths;
  }
}
