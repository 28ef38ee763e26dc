import { MediaEntry, MediaKind, MediaVariant } from '../../../domain/entities/Media';
import { IExtractionStrategy, PageDocument } from '../../../domain/interfaces/IMediaExtractor';
import { JsonRecord, getArray, getNumber, getRecord, getString } from '../json';
import { MediaEntryFactory } from '../MediaEntryFactory';
import { findPostRecords, pickPostRecord } from './postRecords';

/**
 * Reads the embed (syndication) JSON: `mediaDetails` when present,
 * otherwise its flattened `photos` and `video` fields
 */
export class SyndicationStrategy implements IExtractionStrategy {
    readonly name = 'syndication';

    constructor(private readonly factory: MediaEntryFactory) {}

    tryExtract(document: PageDocument): MediaEntry[] | null {
        const records = findPostRecords(document.jsonRoots, record =>
            getArray(record, 'mediaDetails') || getArray(record, 'photos') || getRecord(record, 'video')
                ? record
                : undefined
        );

        const tweet = pickPostRecord(records, document.post.id);
        if (!tweet) return null;

        const details = getArray(tweet, 'mediaDetails');
        if (details && details.length > 0) {
            return this.factory.collect(details.map((entity, index) => this.factory.fromEntity(index, entity)));
        }

        return this.factory.collect(this.fromFlattened(tweet));
    }

    /**
     * The flattened shape keeps photos and the video apart. Photos carry
     * their 1-based place in the post in `expandedUrl` (`.../photo/<n>`);
     * the video takes the first place no photo holds. Without those
     * places the video goes last.
     */
    private fromFlattened(tweet: JsonRecord): Array<MediaEntry | null> {
        const photos = (getArray(tweet, 'photos') ?? []).flatMap(photo => {
            const url = getString(photo, 'url');
            return url ? [{ photo, url, place: photoPlace(getString(photo, 'expandedUrl')) }] : [];
        });
        const video = getRecord(tweet, 'video');

        const slots: Array<{ place: number; build: (index: number) => MediaEntry | null }> = photos.map(
            ({ photo, url, place }, order) => ({
                place: place ?? order + 1,
                build: (index: number) =>
                    this.factory.photo(index, url, getNumber(photo, 'width'), getNumber(photo, 'height'))
            })
        );

        if (video) {
            const taken = new Set(photos.map(({ place }) => place));
            const placed = photos.length > 0 && photos.every(({ place }) => place !== undefined);
            let place = photos.length + 1;
            if (placed) {
                place = 1;
                while (taken.has(place)) place++;
            }
            slots.push({ place, build: (index: number) => this.fromVideo(index, video) });
        }

        // Stable sort keeps declared order for equal places
        return slots
            .sort((a, b) => a.place - b.place)
            .map((slot, index) => slot.build(index));
    }

    private fromVideo(index: number, video: JsonRecord): MediaEntry | null {
        const variants: MediaVariant[] = [];
        for (const item of getArray(video, 'variants') ?? []) {
            const url = getString(item, 'src') ?? getString(item, 'url');
            if (url) {
                variants.push({ url, contentType: getString(item, 'type') ?? getString(item, 'content_type') });
            }
        }

        const isGif =
            getString(video, 'contentType') === 'gif' || variants.some(v => v.url.includes('/tweet_video/'));
        return this.factory.video(index, isGif ? MediaKind.ANIMATED_GIF : MediaKind.VIDEO, variants);
    }
}

function photoPlace(expandedUrl: string | undefined): number | undefined {
    const match = expandedUrl?.match(/\/photo\/(\d+)(?:[?#]|$)/);
    return match ? Number(match[1]) : undefined;
}
