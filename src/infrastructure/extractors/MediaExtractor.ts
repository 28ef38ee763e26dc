import { MediaEntry } from '../../domain/entities/Media';
import { IExtractionStrategy, IMediaExtractor } from '../../domain/interfaces/IMediaExtractor';
import { PageContent } from '../../domain/interfaces/IPageFetcher';
import { ParseError, errorMessage } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';
import { MediaEntryFactory } from './MediaEntryFactory';
import { ParsedPageDocument } from './PageDocument';
import { ExtendedEntitiesStrategy } from './strategies/ExtendedEntitiesStrategy';
import { HtmlMetaStrategy } from './strategies/HtmlMetaStrategy';
import { SyndicationStrategy } from './strategies/SyndicationStrategy';
import { UrlPatternStrategy } from './strategies/UrlPatternStrategy';

/**
 * Strategies in the order they are tried: structured JSON first, the raw
 * URL scan last
 */
export function createDefaultStrategies(factory: MediaEntryFactory): IExtractionStrategy[] {
    return [
        new ExtendedEntitiesStrategy(factory),
        new SyndicationStrategy(factory),
        new HtmlMetaStrategy(factory),
        new UrlPatternStrategy(factory)
    ];
}

/**
 * Pure function of the page content: the first strategy that finds
 * anything decides the entries. An empty list means the post has no media.
 */
export class MediaExtractor implements IMediaExtractor {
    constructor(
        private readonly strategies: readonly IExtractionStrategy[],
        private readonly logger: Logger
    ) {}

    extract(content: PageContent): MediaEntry[] {
        const document = ParsedPageDocument.parse(content);

        for (const strategy of this.strategies) {
            let entries: MediaEntry[] | null;
            try {
                entries = strategy.tryExtract(document);
            } catch (error) {
                if (error instanceof ParseError) throw error;
                this.logger.warn(`Strategy ${strategy.name} failed: ${errorMessage(error)}`);
                continue;
            }

            if (entries && entries.length > 0) {
                this.logger.info(`Found ${entries.length} media item(s)`, {
                    strategy: strategy.name,
                    kinds: entries.map(entry => entry.kind)
                });
                return entries;
            }
        }

        this.logger.info(`No media found in post ${content.post.id}`);
        return [];
    }
}
