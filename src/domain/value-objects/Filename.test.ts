import { describe, it, expect } from '@jest/globals';
import { Filename, InvalidFilenameError } from './Filename';
import { MediaKind } from '../entities/Media';

describe('Filename', () => {
    it('should format twitter_<kind>_<seconds>.<ext>', () => {
        expect(Filename.forMedia(MediaKind.PHOTO, 1700000000, 'jpg').toString()).toBe('twitter_photo_1700000000.jpg');
        expect(Filename.forMedia(MediaKind.VIDEO, 1700000000, 'mp4').toString()).toBe('twitter_video_1700000000.mp4');
        expect(Filename.forMedia(MediaKind.ANIMATED_GIF, 1700000000, 'mp4').toString()).toBe('twitter_gif_1700000000.mp4');
    });

    it('should append a counter suffix', () => {
        const name = Filename.forMedia(MediaKind.PHOTO, 1700000000, '.PNG');

        expect(name.withCounter(1).toString()).toBe('twitter_photo_1700000000_1.png');
        expect(name.withCounter(2).getBasename()).toBe('twitter_photo_1700000000_2');
        expect(name.getExtension()).toBe('.png');
    });

    it('should compare by rendered name', () => {
        const a = Filename.forMedia(MediaKind.PHOTO, 1, 'jpg');

        expect(a.equals(Filename.forMedia(MediaKind.PHOTO, 1, 'jpg'))).toBe(true);
        expect(a.equals(a.withCounter(1))).toBe(false);
    });

    it('should reject bad extensions and timestamps', () => {
        expect(() => Filename.forMedia(MediaKind.PHOTO, 1, '../x')).toThrow(InvalidFilenameError);
        expect(() => Filename.forMedia(MediaKind.PHOTO, 1, '')).toThrow(InvalidFilenameError);
        expect(() => Filename.forMedia(MediaKind.PHOTO, -1, 'jpg')).toThrow(InvalidFilenameError);
        expect(() => Filename.forMedia(MediaKind.PHOTO, 1.5, 'jpg')).toThrow(InvalidFilenameError);
    });
});
