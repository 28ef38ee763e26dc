import type { CheerioAPI } from 'cheerio';
import { MediaEntry, MediaKind, MediaVariant } from '../../../domain/entities/Media';
import { IExtractionStrategy, PageDocument } from '../../../domain/interfaces/IMediaExtractor';
import { MediaEntryFactory } from '../MediaEntryFactory';

const VIDEO_META = ['og:video', 'og:video:url', 'og:video:secure_url', 'twitter:player:stream'];
const IMAGE_META = ['og:image', 'twitter:image', 'twitter:image:src'];

/**
 * Reads Open Graph / Twitter Card meta tags and `<video>` elements from
 * markup pages
 */
export class HtmlMetaStrategy implements IExtractionStrategy {
    readonly name = 'html-meta';

    constructor(private readonly factory: MediaEntryFactory) {}

    tryExtract(document: PageDocument): MediaEntry[] | null {
        if (document.isJson) return null;

        const $ = document.dom();
        const candidates: Array<MediaEntry | null> = [];

        const metaVideos = metaContents($, VIDEO_META).map((url): MediaVariant => ({ url }));
        if (metaVideos.length > 0) {
            candidates.push(this.factory.video(candidates.length, kindOf(metaVideos), metaVideos));
        }

        $('video').each((_, element) => {
            const video = $(element);
            const variants: MediaVariant[] = [];

            const src = absoluteUrl(video.attr('src'));
            if (src) variants.push({ url: src });

            video.find('source').each((__, source) => {
                const url = absoluteUrl($(source).attr('src'));
                if (url) variants.push({ url, contentType: $(source).attr('type') || undefined });
            });

            if (variants.length > 0) {
                candidates.push(this.factory.video(candidates.length, kindOf(variants), variants));
            }
        });

        for (const url of metaContents($, IMAGE_META)) {
            if (isPostImage(url)) {
                candidates.push(this.factory.photo(candidates.length, url));
            }
        }

        return this.factory.collect(candidates);
    }
}

function metaContents($: CheerioAPI, keys: readonly string[]): string[] {
    const urls: string[] = [];
    $('meta').each((_, element) => {
        const meta = $(element);
        const key = (meta.attr('property') || meta.attr('name') || '').toLowerCase();
        const url = absoluteUrl(meta.attr('content'));
        if (keys.includes(key) && url && !urls.includes(url)) {
            urls.push(url);
        }
    });
    return urls;
}

function absoluteUrl(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed && /^https?:\/\//i.test(trimmed) ? trimmed : undefined;
}

function isPostImage(url: string): boolean {
    try {
        const parsed = new URL(url);
        return parsed.hostname === 'pbs.twimg.com' && parsed.pathname.startsWith('/media/');
    } catch {
        return false;
    }
}

function kindOf(variants: readonly MediaVariant[]): MediaKind {
    return variants.some(variant => variant.url.includes('/tweet_video/')) ? MediaKind.ANIMATED_GIF : MediaKind.VIDEO;
}
