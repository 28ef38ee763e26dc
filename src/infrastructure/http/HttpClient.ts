import nodeFetch, { FetchError, RequestInit, Response } from 'node-fetch';
import * as http from 'http';
import * as https from 'https';
import { Transform, pipeline } from 'stream';
import {
    IHttpClient,
    RequestOptions,
    ResponseInfo,
    StreamResponse,
    TextResponse
} from '../../domain/interfaces/IHttpClient';
import { Logger } from '../../shared/logging/Logger';
import { AppError, HttpError, NetworkError, errorMessage } from '../../shared/errors/AppError';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 ' +
    '(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

/**
 * Headers of a desktop browser navigating to a page
 */
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'DNT': '1',
    'Upgrade-Insecure-Requests': '1'
};

export interface HttpClientConfig {
    timeout?: number;
    userAgent?: string;
    headers?: Record<string, string>;
    maxRedirects?: number;
    keepAlive?: boolean;
}

/**
 * node-fetch transport owning its keep-alive agents. Construct one per
 * run, hand it to the fetcher and the downloader, and close() it when
 * the run ends.
 */
export class HttpClient implements IHttpClient {
    private config: Required<HttpClientConfig>;
    private readonly httpAgent: http.Agent;
    private readonly httpsAgent: https.Agent;
    private closed = false;

    constructor(
        private logger: Logger,
        config: HttpClientConfig = {}
    ) {
        this.config = {
            timeout: config.timeout ?? 30000,
            userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
            headers: config.headers ?? {},
            maxRedirects: config.maxRedirects ?? 10,
            keepAlive: config.keepAlive ?? true
        };
        this.httpAgent = new http.Agent({ keepAlive: this.config.keepAlive });
        this.httpsAgent = new https.Agent({ keepAlive: this.config.keepAlive });
    }

    async getText(url: string, options: RequestOptions = {}): Promise<TextResponse> {
        const timeout = options.timeout ?? this.config.timeout;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await this.send(url, options, controller);
            const info = this.describe(url, response);
            const body = await response.text();
            return { ...info, body };
        } catch (error) {
            throw this.toNetworkError(error, url, timeout);
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * GET whose body is handed over unread. The timeout bounds the wait for
     * the response headers and then every idle gap in the body.
     */
    async getStream(url: string, options: RequestOptions = {}): Promise<StreamResponse> {
        const timeout = options.timeout ?? this.config.timeout;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        let response: Response;
        try {
            response = await this.send(url, options, controller);
        } catch (error) {
            throw this.toNetworkError(error, url, timeout);
        } finally {
            clearTimeout(timeoutId);
        }

        const info = this.describe(url, response);
        const length = Number(response.headers.get('content-length'));

        return {
            ...info,
            contentLength: Number.isFinite(length) && length > 0 ? length : undefined,
            body: this.watchIdle(response.body, url, timeout, controller)
        };
    }

    /**
     * Release pooled sockets
     */
    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
        this.logger.debug('HTTP client closed');
    }

    private async send(url: string, options: RequestOptions, controller: AbortController): Promise<Response> {
        if (this.closed) {
            throw new NetworkError('HTTP client is closed', { url });
        }

        const requestOptions: RequestInit = {
            method: 'GET',
            headers: {
                'User-Agent': this.config.userAgent,
                ...this.config.headers,
                ...options.headers
            },
            redirect: 'follow',
            follow: this.config.maxRedirects,
            agent: (parsedUrl: URL) => (parsedUrl.protocol === 'http:' ? this.httpAgent : this.httpsAgent),
            signal: controller.signal
        };

        this.logger.debug(`HTTP GET ${url}`);
        const response = await nodeFetch(url, requestOptions);
        this.logger.debug(`HTTP ${response.status} ${url}`, {
            finalUrl: response.url,
            contentType: response.headers.get('content-type') || undefined
        });

        if (!response.ok) {
            // free the socket before surfacing the status
            response.body.resume();
            throw new HttpError(url, response.status, response.statusText);
        }

        return response;
    }

    private describe(url: string, response: Response): ResponseInfo {
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key] = value;
        });

        return {
            url,
            finalUrl: response.url || url,
            status: response.status,
            statusText: response.statusText,
            contentType: response.headers.get('content-type') || '',
            headers
        };
    }

    private watchIdle(
        body: NodeJS.ReadableStream,
        url: string,
        timeout: number,
        controller: AbortController
    ): NodeJS.ReadableStream {
        const watchdog = new Transform({
            transform(chunk: Buffer, _encoding, callback) {
                timer.refresh();
                callback(null, chunk);
            }
        });

        const timer = setTimeout(() => {
            watchdog.destroy(new NetworkError(`No data from ${url} for ${timeout}ms`, { url, timeout }));
            controller.abort();
        }, timeout);

        // Failures reach the consumer through the destroyed watchdog.
        pipeline(body, watchdog, () => clearTimeout(timer));

        return watchdog;
    }

    private toNetworkError(error: unknown, url: string, timeout: number): AppError {
        if (error instanceof AppError) {
            return error;
        }

        if (error instanceof Error && error.name === 'AbortError') {
            return new NetworkError(`Request to ${url} timed out after ${timeout}ms`, { url, timeout });
        }

        if (error instanceof FetchError) {
            return new NetworkError(`Request to ${url} failed: ${error.message}`, {
                url,
                type: error.type,
                code: error.code
            });
        }

        return new NetworkError(`Request to ${url} failed: ${errorMessage(error)}`, { url });
    }
}
