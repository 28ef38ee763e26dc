import { describe, it, expect } from '@jest/globals';
import { PostReference } from './PostReference';
import { InvalidUrlError } from '../../shared/errors/AppError';

describe('PostReference', () => {
    describe('parse', () => {
        it('should parse x.com post URLs', () => {
            const post = PostReference.parse('https://x.com/sample_user/status/1790000000000000001');

            expect(post.handle).toBe('sample_user');
            expect(post.id).toBe('1790000000000000001');
            expect(post.host).toBe('x.com');
        });

        it('should parse twitter.com post URLs', () => {
            const post = PostReference.parse('https://twitter.com/Sample_User/status/123');

            expect(post.handle).toBe('Sample_User');
            expect(post.id).toBe('123');
            expect(post.host).toBe('twitter.com');
        });

        it('should accept www and mobile hosts, query strings and trailing segments', () => {
            const urls = [
                'https://www.x.com/sample_user/status/123?s=20',
                'https://mobile.twitter.com/sample_user/status/123#top',
                'http://x.com/sample_user/status/123/photo/1',
                '  https://x.com/sample_user/status/123  '
            ];

            urls.forEach(url => {
                expect(PostReference.parse(url).id).toBe('123');
            });
        });

        it('should reject URLs that are not posts', () => {
            const invalid = [
                'not a url',
                'ftp://x.com/sample_user/status/123',
                'https://example.com/sample_user/status/123',
                'https://notx.com/sample_user/status/123',
                'https://x.com/sample_user',
                'https://x.com/sample_user/likes/123',
                'https://x.com/sample_user/status/12ab',
                'https://x.com/sample-user/status/123',
                'https://x.com/a_handle_that_is_too_long/status/123'
            ];

            invalid.forEach(url => {
                expect(() => PostReference.parse(url)).toThrow(InvalidUrlError);
            });
        });

        it('should tag the error with the url stage', () => {
            try {
                PostReference.parse('https://example.com/a/status/1');
                throw new Error('expected parse to fail');
            } catch (error) {
                expect(error).toBeInstanceOf(InvalidUrlError);
                if (error instanceof InvalidUrlError) {
                    expect(error.stage).toBe('url');
                    expect(error.code).toBe('INVALID_URL');
                }
            }
        });
    });

    describe('derived URLs', () => {
        it('should normalize to x.com', () => {
            const post = PostReference.parse('https://mobile.twitter.com/sample_user/status/55?s=1');

            expect(post.normalizedUrl).toBe('https://x.com/sample_user/status/55');
            expect(post.toString()).toBe('https://x.com/sample_user/status/55');
        });

        it('should build the syndication URL from the ID', () => {
            const post = PostReference.parse('https://x.com/sample_user/status/55');

            expect(post.syndicationUrl).toBe('https://cdn.syndication.twimg.com/widgets/tweet?id=55&lang=en');
        });

        it('should compare posts by ID', () => {
            const a = PostReference.parse('https://x.com/sample_user/status/55');
            const b = PostReference.parse('https://twitter.com/other_name/status/55');
            const c = PostReference.parse('https://x.com/sample_user/status/56');

            expect(a.equals(b)).toBe(true);
            expect(a.equals(c)).toBe(false);
        });
    });
});
