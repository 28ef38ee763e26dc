import { DEFAULT_OUTPUT_DIR } from './application/use-cases/DownloadFromUrlUseCase';
import { DEFAULT_CONFIG, AppConfig } from './presentation/config/ConfigLoader';
import { setupDependencies } from './presentation/cli/setup';
import { Logger, NullLogger } from './shared/logging/Logger';

export * from './domain';
export * from './shared';
export * from './application/use-cases/DownloadFromUrlUseCase';
export * from './infrastructure/http/HttpClient';
export * from './infrastructure/fetchers/PageFetcher';
export * from './infrastructure/extractors/MediaEntryFactory';
export * from './infrastructure/extractors/MediaExtractor';
export * from './infrastructure/extractors/PageDocument';
export * from './infrastructure/extractors/strategies/ExtendedEntitiesStrategy';
export * from './infrastructure/extractors/strategies/SyndicationStrategy';
export * from './infrastructure/extractors/strategies/HtmlMetaStrategy';
export * from './infrastructure/extractors/strategies/UrlPatternStrategy';
export * from './infrastructure/downloaders/MediaDownloader';
export * from './infrastructure/storage/LocalFileStorage';
export { ConfigLoader, AppConfig, ConfigOverrides, DEFAULT_CONFIG } from './presentation/config/ConfigLoader';
export { setupDependencies, Dependencies } from './presentation/cli/setup';

/**
 * Download every photo, video and GIF of a post into outputDir and
 * resolve to the saved paths, in post order
 */
export async function downloadFromUrl(
  url: string,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  options: Partial<AppConfig> = {},
  logger: Logger = new NullLogger()
): Promise<string[]> {
  const config: AppConfig = { ...DEFAULT_CONFIG, ...options, outputDir };
  const { useCase, close } = setupDependencies(config, logger);

  try {
    const report = await useCase.execute({
      url,
      outputDir,
      concurrency: config.concurrency,
      progressInterval: config.progressInterval
    });
    return report.paths;
  } finally {
    close();
  }
}
