import { describe, it, expect, jest } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { MediaEntry, MediaKind } from '../../domain/entities/Media';
import { IExtractionStrategy } from '../../domain/interfaces/IMediaExtractor';
import { PageContent } from '../../domain/interfaces/IPageFetcher';
import { PostReference } from '../../domain/value-objects/PostReference';
import { ParseError } from '../../shared/errors/AppError';
import { NullLogger } from '../../shared/logging/Logger';
import { MediaEntryFactory } from './MediaEntryFactory';
import { MediaExtractor, createDefaultStrategies } from './MediaExtractor';

const FIXTURES = path.join(__dirname, '../../../fixtures');

function fixture(name: string, postUrl: string, contentType: string): PageContent {
    const post = PostReference.parse(postUrl);
    return {
        post,
        source: 'page',
        url: post.normalizedUrl,
        finalUrl: post.normalizedUrl,
        status: 200,
        contentType,
        body: fs.readFileSync(path.join(FIXTURES, name), 'utf8')
    };
}

function createExtractor(): MediaExtractor {
    return new MediaExtractor(createDefaultStrategies(new MediaEntryFactory()), new NullLogger());
}

function summarize(entries: MediaEntry[]): Array<[MediaKind, string]> {
    return entries.map(entry => [entry.kind, entry.source.url]);
}

describe('MediaExtractor', () => {
    it('should read API media entities of the requested post only', () => {
        const content = fixture('graphql-tweet.json', 'https://x.com/sample_user/status/1790000000000000001', 'application/json');

        const entries = createExtractor().extract(content);

        expect(summarize(entries)).toEqual([
            [MediaKind.PHOTO, 'https://pbs.twimg.com/media/PhotoAAA.jpg?name=orig'],
            [MediaKind.VIDEO, 'https://video.twimg.com/ext_tw_video/200/pu/vid/1280x720/high.mp4']
        ]);
        expect(entries[0].source.width).toBe(1200);
        expect(entries[1].variants).toHaveLength(4);
    });

    it('should read the quoted post when that is the one requested', () => {
        const content = fixture('graphql-tweet.json', 'https://x.com/other_user/status/1790000000000000999', 'application/json');

        expect(summarize(createExtractor().extract(content))).toEqual([
            [MediaKind.PHOTO, 'https://pbs.twimg.com/media/QuotedZZZ.jpg?name=orig']
        ]);
    });

    it('should read syndication JSON', () => {
        const content = fixture('syndication-tweet.json', 'https://x.com/sample_user/status/1790000000000000002', 'application/json; charset=utf-8');

        const entries = createExtractor().extract(content);

        expect(summarize(entries)).toEqual([[MediaKind.ANIMATED_GIF, 'https://video.twimg.com/tweet_video/GifBBB.mp4']]);
        expect(entries[0].getFileExtension()).toBe('mp4');
    });

    it('should read meta tags and video elements from markup', () => {
        const content = fixture('page-meta.html', 'https://x.com/sample_user/status/1790000000000000005', 'text/html');

        expect(summarize(createExtractor().extract(content))).toEqual([
            [MediaKind.VIDEO, 'https://video.twimg.com/amplify_video/300/vid/720x1280/vert.mp4'],
            [MediaKind.PHOTO, 'https://pbs.twimg.com/media/MetaCCC.jpg?name=orig']
        ]);
    });

    it('should read state embedded in a script', () => {
        const content = fixture('page-initial-state.html', 'https://x.com/sample_user/status/1790000000000000004', 'text/html');

        const entries = createExtractor().extract(content);

        expect(summarize(entries)).toEqual([[MediaKind.PHOTO, 'https://pbs.twimg.com/media/StateDDD.png?name=orig']]);
        expect(entries[0].getFileExtension()).toBe('png');
    });

    it('should return an empty list for a post without media', () => {
        const content = fixture('page-no-media.html', 'https://x.com/sample_user/status/1790000000000000006', 'text/html');

        expect(createExtractor().extract(content)).toEqual([]);
    });

    it('should give the same result for the same content', () => {
        const content = fixture('graphql-tweet.json', 'https://x.com/sample_user/status/1790000000000000001', 'application/json');
        const extractor = createExtractor();

        expect(summarize(extractor.extract(content))).toEqual(summarize(extractor.extract(content)));
    });

    it('should raise ParseError for unparseable content', () => {
        const content = fixture('page-no-media.html', 'https://x.com/sample_user/status/1', 'application/json');

        expect(() => createExtractor().extract(content)).toThrow(ParseError);
    });

    it('should skip a strategy that throws and use the next one', () => {
        const photo = new MediaEntryFactory().photo(0, 'https://pbs.twimg.com/media/AAA.jpg');
        const broken: IExtractionStrategy = {
            name: 'broken',
            tryExtract: () => {
                throw new TypeError('unexpected shape');
            }
        };
        const working: IExtractionStrategy = { name: 'working', tryExtract: jest.fn(() => [photo]) };
        const logger = new NullLogger();
        const warn = jest.spyOn(logger, 'warn');
        const content = fixture('page-no-media.html', 'https://x.com/sample_user/status/1', 'text/html');

        const entries = new MediaExtractor([broken, working], logger).extract(content);

        expect(entries).toEqual([photo]);
        expect(warn).toHaveBeenCalledWith('Strategy broken failed: unexpected shape');
    });

    it('should stop at the first strategy that finds media', () => {
        const photo = new MediaEntryFactory().photo(0, 'https://pbs.twimg.com/media/AAA.jpg');
        const empty: IExtractionStrategy = { name: 'empty', tryExtract: jest.fn(() => []) };
        const first: IExtractionStrategy = { name: 'first', tryExtract: jest.fn(() => [photo]) };
        const never = jest.fn(() => null);
        const content = fixture('page-no-media.html', 'https://x.com/sample_user/status/1', 'text/html');

        new MediaExtractor([empty, first, { name: 'never', tryExtract: never }], new NullLogger()).extract(content);

        expect(never).not.toHaveBeenCalled();
    });
});
