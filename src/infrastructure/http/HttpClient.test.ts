import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { Readable } from 'stream';
import nodeFetch, { FetchError, RequestInfo, RequestInit, Response } from 'node-fetch';
import { HttpClient, DEFAULT_USER_AGENT } from './HttpClient';
import { HttpError, NetworkError } from '../../shared/errors/AppError';
import { NullLogger } from '../../shared/logging/Logger';

jest.mock('node-fetch', () => {
    const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
    return { __esModule: true, ...actual, default: jest.fn() };
});

type Fetch = (url: RequestInfo, init?: RequestInit) => Promise<Response>;

const mockedFetch = jest.mocked<Fetch>(nodeFetch);

const PAGE_URL = 'https://x.com/sample_user/status/1';
const MEDIA_URL = 'https://pbs.twimg.com/media/AAA.jpg?name=orig';

function respond(chunks: string[], status: number = 200, headers: Record<string, string> = {}): Response {
    return new Response(Readable.from(chunks.map(chunk => Buffer.from(chunk))), {
        status,
        statusText: status === 200 ? 'OK' : 'Not Found',
        url: PAGE_URL,
        headers
    });
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString('utf8');
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        mockedFetch.mockReset();
        client = new HttpClient(new NullLogger(), { timeout: 1000 });
    });

    afterEach(() => {
        client.close();
    });

    describe('getText', () => {
        it('should return the body and response details', async () => {
            mockedFetch.mockResolvedValue(respond(['<html>', '</html>'], 200, { 'Content-Type': 'text/html' }));

            const response = await client.getText(PAGE_URL, { headers: { Accept: 'text/html' } });

            expect(response).toMatchObject({
                url: PAGE_URL,
                finalUrl: PAGE_URL,
                status: 200,
                contentType: 'text/html',
                body: '<html></html>'
            });
            expect(response.headers['content-type']).toBe('text/html');
        });

        it('should send the user agent and merged headers', async () => {
            mockedFetch.mockResolvedValue(respond(['ok']));

            await client.getText(PAGE_URL, { headers: { Accept: 'text/html' } });

            const init = mockedFetch.mock.calls[0][1];
            expect(init?.headers).toEqual({ 'User-Agent': DEFAULT_USER_AGENT, Accept: 'text/html' });
            expect(init?.redirect).toBe('follow');
            expect(init?.follow).toBe(10);
        });

        it('should raise HttpError for non-2xx statuses', async () => {
            mockedFetch.mockResolvedValue(respond(['missing'], 404));

            await expect(client.getText(PAGE_URL)).rejects.toMatchObject({
                code: 'HTTP_ERROR',
                status: 404,
                message: `GET ${PAGE_URL} returned 404 Not Found`
            });
        });

        it('should raise NetworkError for connection failures', async () => {
            const systemError = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
            mockedFetch.mockRejectedValue(new FetchError('connect ECONNREFUSED', 'system', systemError));

            const error = await client.getText(PAGE_URL).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(NetworkError);
            expect(error).toMatchObject({
                message: `Request to ${PAGE_URL} failed: connect ECONNREFUSED`,
                details: { url: PAGE_URL, type: 'system', code: 'ECONNREFUSED' }
            });
        });

        it('should raise NetworkError when the request times out', async () => {
            const abortError = new Error('The operation was aborted.');
            abortError.name = 'AbortError';
            mockedFetch.mockImplementation((_url, init) => new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => reject(abortError));
            }));

            await expect(client.getText(PAGE_URL, { timeout: 20 })).rejects.toThrow(
                `Request to ${PAGE_URL} timed out after 20ms`
            );
        });
    });

    describe('getStream', () => {
        it('should hand over the body with its length', async () => {
            mockedFetch.mockResolvedValue(respond(['abc', 'def'], 200, { 'Content-Length': '6', 'Content-Type': 'image/jpeg' }));

            const response = await client.getStream(MEDIA_URL);

            expect(response.contentLength).toBe(6);
            expect(response.contentType).toBe('image/jpeg');
            expect(await readAll(response.body)).toBe('abcdef');
        });

        it('should leave the length unset without Content-Length', async () => {
            mockedFetch.mockResolvedValue(respond(['abc']));

            const response = await client.getStream(MEDIA_URL);

            expect(response.contentLength).toBeUndefined();
            expect(await readAll(response.body)).toBe('abc');
        });

        it('should fail a body that stalls', async () => {
            const stalled = new Readable({ read() {} });
            mockedFetch.mockResolvedValue(new Response(stalled, { status: 200, url: MEDIA_URL }));

            const response = await client.getStream(MEDIA_URL, { timeout: 20 });

            await expect(readAll(response.body)).rejects.toThrow(NetworkError);
        });

        it('should raise HttpError before handing over a body', async () => {
            mockedFetch.mockResolvedValue(respond(['gone'], 404));

            await expect(client.getStream(MEDIA_URL)).rejects.toThrow(HttpError);
        });
    });

    it('should refuse requests after close', async () => {
        client.close();

        await expect(client.getText(PAGE_URL)).rejects.toThrow('HTTP client is closed');
        expect(mockedFetch).not.toHaveBeenCalled();
    });
});
