import { IHttpClient } from '../../domain/interfaces/IHttpClient';
import { IPageFetcher, PageContent, PostSource } from '../../domain/interfaces/IPageFetcher';
import { PostReference } from '../../domain/value-objects/PostReference';
import { EmptyResponseError } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';
import { BROWSER_HEADERS } from '../http/HttpClient';

const SYNDICATION_HEADERS: Readonly<Record<string, string>> = {
    'Accept': 'application/json, text/javascript, */*; q=0.01',
    'Accept-Language': 'en-US,en;q=0.9',
    'Referer': 'https://platform.twitter.com/',
    'Origin': 'https://platform.twitter.com'
};

export interface PageFetcherConfig {
    source?: PostSource;
    timeout?: number;
}

/**
 * Issues the single GET that retrieves a post's page (or its syndication
 * JSON). No caching and no retries.
 */
export class PageFetcher implements IPageFetcher {
    private readonly source: PostSource;

    constructor(
        private readonly http: IHttpClient,
        private readonly logger: Logger,
        private readonly config: PageFetcherConfig = {}
    ) {
        this.source = config.source ?? 'page';
    }

    async fetch(postUrl: string): Promise<PageContent> {
        const post = PostReference.parse(postUrl);
        const url = this.source === 'syndication' ? post.syndicationUrl : post.normalizedUrl;
        const headers = this.source === 'syndication' ? SYNDICATION_HEADERS : BROWSER_HEADERS;

        this.logger.info(`Fetching post ${post.id} by @${post.handle}`, { url, source: this.source });

        const response = await this.http.getText(url, {
            headers: { ...headers },
            timeout: this.config.timeout
        });

        if (response.body.trim().length === 0) {
            throw new EmptyResponseError(url);
        }

        this.logger.debug(`Fetched ${response.body.length} characters`, {
            finalUrl: response.finalUrl,
            contentType: response.contentType
        });

        return {
            post,
            source: this.source,
            url,
            finalUrl: response.finalUrl,
            status: response.status,
            contentType: response.contentType,
            body: response.body
        };
    }
}
