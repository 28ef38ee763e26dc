import { DownloadFromUrlUseCase } from '../../application/use-cases/DownloadFromUrlUseCase';
import { PageFetcher } from '../../infrastructure/fetchers/PageFetcher';
import { MediaEntryFactory } from '../../infrastructure/extractors/MediaEntryFactory';
import { MediaExtractor, createDefaultStrategies } from '../../infrastructure/extractors/MediaExtractor';
import { MediaDownloader } from '../../infrastructure/downloaders/MediaDownloader';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import { Logger, createChildLogger } from '../../shared/logging/Logger';
import { AppConfig } from '../config/ConfigLoader';

export interface Dependencies {
    useCase: DownloadFromUrlUseCase;
    httpClient: HttpClient;
    /** Release the HTTP client's sockets */
    close(): void;
}

/**
 * Set up all dependencies using manual dependency injection. The caller
 * owns the returned HTTP client and must close() it.
 */
export function setupDependencies(config: AppConfig, logger: Logger): Dependencies {
    const httpClient = new HttpClient(createChildLogger(logger, 'http'), {
        timeout: config.timeout,
        userAgent: config.userAgent
    });

    const fetcher = new PageFetcher(httpClient, createChildLogger(logger, 'fetcher'), {
        source: config.source,
        timeout: config.timeout
    });

    const extractorLogger = createChildLogger(logger, 'extractor');
    const factory = new MediaEntryFactory({ includeHls: config.includeHls }, extractorLogger);
    const extractor = new MediaExtractor(createDefaultStrategies(factory), extractorLogger);

    const downloaderLogger = createChildLogger(logger, 'downloader');
    const downloader = new MediaDownloader(httpClient, new LocalFileStorage(downloaderLogger), downloaderLogger);

    return {
        useCase: new DownloadFromUrlUseCase(fetcher, extractor, downloader, logger),
        httpClient,
        close: () => httpClient.close()
    };
}
