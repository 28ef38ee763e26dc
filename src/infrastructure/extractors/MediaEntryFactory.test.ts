import { describe, it, expect } from '@jest/globals';
import { MediaKind } from '../../domain/entities/Media';
import { MediaEntryFactory, originalImageUrl } from './MediaEntryFactory';

describe('MediaEntryFactory', () => {
    const factory = new MediaEntryFactory();

    describe('originalImageUrl', () => {
        it('should request the original size of post images', () => {
            expect(originalImageUrl('https://pbs.twimg.com/media/AAA.jpg')).toBe('https://pbs.twimg.com/media/AAA.jpg?name=orig');
            expect(originalImageUrl('https://pbs.twimg.com/media/AAA.jpg:large')).toBe('https://pbs.twimg.com/media/AAA.jpg?name=orig');
            expect(originalImageUrl('https://pbs.twimg.com/media/AAA?format=png&name=small')).toBe(
                'https://pbs.twimg.com/media/AAA?format=png&name=orig'
            );
        });

        it('should leave other URLs alone', () => {
            expect(originalImageUrl('https://pbs.twimg.com/profile_images/1/a.jpg')).toBe('https://pbs.twimg.com/profile_images/1/a.jpg');
            expect(originalImageUrl('not a url')).toBe('not a url');
        });
    });

    describe('fromEntity', () => {
        it('should build a photo with its original dimensions', () => {
            const entry = factory.fromEntity(0, {
                type: 'photo',
                media_key: '3_1',
                media_url_https: 'https://pbs.twimg.com/media/AAA.png',
                original_info: { width: 100, height: 50 }
            });

            expect(entry?.kind).toBe(MediaKind.PHOTO);
            expect(entry?.mediaKey).toBe('3_1');
            expect(entry?.source).toEqual({ url: 'https://pbs.twimg.com/media/AAA.png?name=orig', width: 100, height: 50 });
            expect(entry?.getFileExtension()).toBe('png');
        });

        it('should classify animated GIFs and videos', () => {
            const gif = factory.fromEntity(0, {
                type: 'animated_gif',
                video_info: { variants: [{ bitrate: 0, content_type: 'video/mp4', url: 'https://video.twimg.com/tweet_video/G.mp4' }] }
            });
            const video = factory.fromEntity(1, {
                type: 'video',
                video_info: { variants: [{ bitrate: '832000', content_type: 'video/mp4', url: 'https://video.twimg.com/ext_tw_video/1/v.mp4' }] }
            });

            expect(gif?.kind).toBe(MediaKind.ANIMATED_GIF);
            expect(gif?.source.url).toBe('https://video.twimg.com/tweet_video/G.mp4');
            expect(video?.kind).toBe(MediaKind.VIDEO);
            expect(video?.source.bitrate).toBe(832000);
        });

        it('should drop a video without a downloadable variant', () => {
            const entry = factory.fromEntity(0, {
                type: 'video',
                media_url_https: 'https://pbs.twimg.com/ext_tw_video_thumb/1/thumb.jpg',
                video_info: { variants: [{ content_type: 'application/x-mpegURL', url: 'https://video.twimg.com/pl.m3u8' }] }
            });

            expect(entry).toBeNull();
        });

        it('should drop entities it cannot read', () => {
            expect(factory.fromEntity(0, { type: 'video' })).toBeNull();
            expect(factory.fromEntity(0, 'nonsense')).toBeNull();
        });
    });

    describe('collect', () => {
        it('should drop nulls and repeated sources', () => {
            const a = factory.photo(0, 'https://pbs.twimg.com/media/AAA.jpg');
            const b = factory.photo(1, 'https://pbs.twimg.com/media/AAA.jpg:large');
            const c = factory.photo(2, 'https://pbs.twimg.com/media/BBB.jpg');

            expect(factory.collect([a, null, b, c])).toEqual([a, c]);
        });
    });
});
