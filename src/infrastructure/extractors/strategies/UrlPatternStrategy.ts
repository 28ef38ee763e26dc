import { MediaEntry, MediaKind, MediaVariant } from '../../../domain/entities/Media';
import { IExtractionStrategy, PageDocument } from '../../../domain/interfaces/IMediaExtractor';
import { MediaEntryFactory } from '../MediaEntryFactory';

const VIDEO_URL = /https?:\/\/video\.twimg\.com\/[^\s"'<>\\]+?\.(?:mp4|m3u8)(?:\?[^\s"'<>\\]*)?/g;
const IMAGE_URL = /https?:\/\/pbs\.twimg\.com\/media\/[A-Za-z0-9_-]+(?:\.(?:jpe?g|png|webp|gif))?(?::[a-z]+)?(?:\?[^\s"'<>\\]*)?/g;

interface UrlGroup {
    kind: MediaKind;
    position: number;
    urls: string[];
}

/**
 * Last resort: scans the raw body for media CDN URLs. Not scoped to the
 * requested post, so it only runs when every structured strategy found
 * nothing.
 */
export class UrlPatternStrategy implements IExtractionStrategy {
    readonly name = 'url-pattern';

    constructor(private readonly factory: MediaEntryFactory) {}

    tryExtract(document: PageDocument): MediaEntry[] | null {
        const text = unescapeBody(document.content.body);
        const groups = new Map<string, UrlGroup>();

        const add = (key: string, kind: MediaKind, position: number, url: string): void => {
            const group = groups.get(key);
            if (!group) {
                groups.set(key, { kind, position, urls: [url] });
            } else if (!group.urls.includes(url)) {
                group.urls.push(url);
            }
        };

        for (const match of text.matchAll(VIDEO_URL)) {
            const url = match[0];
            const key = videoGroupKey(url);
            add(key, key.startsWith('gif:') ? MediaKind.ANIMATED_GIF : MediaKind.VIDEO, match.index ?? 0, url);
        }

        for (const match of text.matchAll(IMAGE_URL)) {
            const url = match[0];
            add(`photo:${imageName(url)}`, MediaKind.PHOTO, match.index ?? 0, url);
        }

        const ordered = [...groups.values()].sort((a, b) => a.position - b.position);
        return this.factory.collect(
            ordered.map((group, index) => {
                if (group.kind === MediaKind.PHOTO) {
                    return this.factory.photo(index, group.urls[0]);
                }
                const variants = group.urls.map((url): MediaVariant => ({ url }));
                return this.factory.video(index, group.kind, variants);
            })
        );
    }
}

/**
 * Undo the JSON and HTML escaping URLs pick up inside script payloads
 */
export function unescapeBody(body: string): string {
    return body
        .replace(/\\u002[fF]/g, '/')
        .replace(/\\u0026/g, '&')
        .replace(/\\\//g, '/')
        .replace(/&amp;/g, '&');
}

function videoGroupKey(url: string): string {
    const video = url.match(/\/(ext_tw_video|amplify_video)\/(\d+)\//);
    if (video) return `video:${video[1]}/${video[2]}`;

    const gif = url.match(/\/tweet_video\/([A-Za-z0-9_-]+)/);
    if (gif) return `gif:${gif[1]}`;

    return `video:${url}`;
}

function imageName(url: string): string {
    const match = url.match(/\/media\/([A-Za-z0-9_-]+)/);
    return match ? match[1] : url;
}
