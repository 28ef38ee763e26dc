import { MediaEntry, MediaKind, MediaVariant } from '../../domain/entities/Media';
import { Logger, NullLogger } from '../../shared/logging/Logger';
import { VariantSelectionOptions, selectBestVariant } from './variants';
import { getArray, getNumber, getRecord, getString } from './json';

/**
 * Rewrite `pbs.twimg.com/media/...` image URLs to their original size
 */
export function originalImageUrl(raw: string): string {
    try {
        const parsed = new URL(raw);
        if (parsed.hostname !== 'pbs.twimg.com' || !parsed.pathname.startsWith('/media/')) {
            return raw;
        }

        parsed.pathname = parsed.pathname.replace(/:[a-z]+$/, '');
        parsed.searchParams.set('name', 'orig');
        return parsed.toString();
    } catch {
        return raw;
    }
}

/**
 * Builds MediaEntry objects, choosing each entry's source variant. Shared
 * by every extraction strategy so they classify and select alike.
 */
export class MediaEntryFactory {
    constructor(
        private readonly options: VariantSelectionOptions = {},
        private readonly logger: Logger = new NullLogger()
    ) {}

    photo(index: number, url: string, width?: number, height?: number, mediaKey?: string): MediaEntry {
        const variant: MediaVariant = { url: originalImageUrl(url), width, height };
        return new MediaEntry(index, MediaKind.PHOTO, [variant], variant, mediaKey);
    }

    /**
     * Video or GIF entry, or null when no variant can be downloaded
     */
    video(index: number, kind: MediaKind, variants: MediaVariant[], mediaKey?: string): MediaEntry | null {
        const source = selectBestVariant(variants, this.options);
        if (!source) {
            this.logger.warn(`Skipping ${kind} #${index}: no downloadable variant`, {
                variants: variants.length,
                mediaKey
            });
            return null;
        }
        return new MediaEntry(index, kind, variants, source, mediaKey);
    }

    /**
     * Entry from an API media entity:
     * `{ type, media_key, media_url_https, original_info, video_info: { variants } }`
     */
    fromEntity(index: number, entity: unknown): MediaEntry | null {
        const type = getString(entity, 'type');
        const mediaKey = getString(entity, 'media_key') ?? getString(entity, 'id_str');
        const variants = parseEntityVariants(entity);

        if (type === 'animated_gif') {
            return this.video(index, MediaKind.ANIMATED_GIF, variants, mediaKey);
        }

        if (variants.length > 0) {
            return this.video(index, MediaKind.VIDEO, variants, mediaKey);
        }

        const imageUrl = getString(entity, 'media_url_https') ?? getString(entity, 'media_url');
        if (imageUrl && (type === 'photo' || type === undefined)) {
            const info = getRecord(entity, 'original_info');
            return this.photo(index, imageUrl, getNumber(info, 'width'), getNumber(info, 'height'), mediaKey);
        }

        this.logger.warn(`Skipping media #${index}: nothing downloadable`, { type, mediaKey });
        return null;
    }

    /**
     * Build entries, dropping nulls and repeats of the same source URL
     */
    collect(candidates: Array<MediaEntry | null>): MediaEntry[] {
        const seen = new Set<string>();
        const entries: MediaEntry[] = [];

        for (const entry of candidates) {
            if (!entry || seen.has(entry.source.url)) {
                continue;
            }
            seen.add(entry.source.url);
            entries.push(entry);
        }

        return entries;
    }
}

function parseEntityVariants(entity: unknown): MediaVariant[] {
    const raw = getArray(getRecord(entity, 'video_info'), 'variants') ?? [];
    const variants: MediaVariant[] = [];

    for (const item of raw) {
        const url = getString(item, 'url') ?? getString(item, 'src');
        if (!url) continue;
        variants.push({
            url,
            contentType: getString(item, 'content_type') ?? getString(item, 'type'),
            bitrate: getNumber(item, 'bitrate') ?? getNumber(item, 'bit_rate')
        });
    }

    return variants;
}
