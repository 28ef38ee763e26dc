import { describe, it, expect } from '@jest/globals';
import { MediaKind } from '../../../domain/entities/Media';
import { PageContent } from '../../../domain/interfaces/IPageFetcher';
import { PostReference } from '../../../domain/value-objects/PostReference';
import { MediaEntryFactory } from '../MediaEntryFactory';
import { ParsedPageDocument } from '../PageDocument';
import { UrlPatternStrategy, unescapeBody } from './UrlPatternStrategy';

function document(body: string): ParsedPageDocument {
    const post = PostReference.parse('https://x.com/sample_user/status/7');
    const content: PageContent = {
        post,
        source: 'page',
        url: post.normalizedUrl,
        finalUrl: post.normalizedUrl,
        status: 200,
        contentType: 'text/html',
        body
    };
    return ParsedPageDocument.parse(content);
}

describe('UrlPatternStrategy', () => {
    const strategy = new UrlPatternStrategy(new MediaEntryFactory());

    it('should undo script escaping', () => {
        expect(unescapeBody('https:\\/\\/a\\u002Fb?x=1&amp;y=2\\u0026z=3')).toBe('https://a/b?x=1&y=2&z=3');
    });

    it('should group variants of one video and keep page order', () => {
        const body = [
            '<html><body>',
            '<img src="https://pbs.twimg.com/media/FirstAAA.jpg?format=jpg&amp;name=small">',
            '<script>var data = {"a":"https:\\/\\/video.twimg.com\\/ext_tw_video\\/50\\/pu\\/vid\\/640x360\\/s.mp4?tag=12",',
            '"b":"https:\\/\\/video.twimg.com\\/ext_tw_video\\/50\\/pu\\/vid\\/1280x720\\/l.mp4?tag=12"};</script>',
            '<a href="https://video.twimg.com/tweet_video/LoopBBB.mp4">gif</a>',
            '<img src="https://pbs.twimg.com/media/FirstAAA.jpg?format=jpg&amp;name=large">',
            '</body></html>'
        ].join('\n');

        const entries = strategy.tryExtract(document(body));

        expect(entries?.map(entry => [entry.kind, entry.source.url])).toEqual([
            [MediaKind.PHOTO, 'https://pbs.twimg.com/media/FirstAAA.jpg?format=jpg&name=orig'],
            [MediaKind.VIDEO, 'https://video.twimg.com/ext_tw_video/50/pu/vid/1280x720/l.mp4?tag=12'],
            [MediaKind.ANIMATED_GIF, 'https://video.twimg.com/tweet_video/LoopBBB.mp4']
        ]);
        expect(entries?.[1].variants).toHaveLength(2);
    });

    it('should find nothing in a page without media URLs', () => {
        const body = '<html><body><img src="https://pbs.twimg.com/profile_images/1/a.jpg"></body></html>';

        expect(strategy.tryExtract(document(body))).toEqual([]);
    });
});
