import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { PageContent } from '../../domain/interfaces/IPageFetcher';
import { PageDocument } from '../../domain/interfaces/IMediaExtractor';
import { PostReference } from '../../domain/value-objects/PostReference';
import { ParseError } from '../../shared/errors/AppError';
import { sliceBalanced, tryParseJson } from './json';

const JSON_SCRIPT_TYPES = ['application/json', 'application/ld+json'];
const STATE_ASSIGNMENT = /window\.__INITIAL_STATE__\s*=\s*/g;
const MARKUP_TAG = /<(?:[a-zA-Z][\w:-]*|!doctype|!--)[\s>/]/i;

/**
 * Parsed view of a fetched page. Building it is the only step that
 * can reject content outright.
 */
export class ParsedPageDocument implements PageDocument {
    private $?: CheerioAPI;

    private constructor(
        public readonly content: PageContent,
        public readonly isJson: boolean,
        public readonly jsonRoots: readonly unknown[],
        dom?: CheerioAPI
    ) {
        this.$ = dom;
    }

    get post(): PostReference {
        return this.content.post;
    }

    dom(): CheerioAPI {
        if (!this.$) {
            this.$ = cheerio.load(this.isJson ? '' : this.content.body);
        }
        return this.$;
    }

    /**
     * @throws ParseError when the body is binary, malformed JSON, or has
     * neither JSON shape nor any markup tag
     */
    static parse(content: PageContent): ParsedPageDocument {
        const body = content.body;

        if (body.includes('\u0000')) {
            throw new ParseError('Page content is binary, not text', { url: content.url });
        }

        const trimmed = body.trimStart();
        const looksLikeJson =
            trimmed.startsWith('{') || trimmed.startsWith('[') || /[/+]json\b/i.test(content.contentType);

        if (looksLikeJson) {
            const root = tryParseJson(body);
            if (root === undefined) {
                throw new ParseError('Page content is not valid JSON', {
                    url: content.url,
                    contentType: content.contentType
                });
            }
            return new ParsedPageDocument(content, true, [root]);
        }

        if (!MARKUP_TAG.test(body)) {
            throw new ParseError('Page content is neither markup nor JSON', {
                url: content.url,
                contentType: content.contentType
            });
        }

        const $ = cheerio.load(body);
        return new ParsedPageDocument(content, false, embeddedJson($), $);
    }
}

/**
 * JSON payloads of `<script type="application/json">` tags and
 * `window.__INITIAL_STATE__ = {...};` assignments. Payloads that do not
 * parse are left out.
 */
function embeddedJson($: CheerioAPI): unknown[] {
    const roots: unknown[] = [];

    $('script').each((_, element) => {
        const script = $(element);
        const text = script.text();
        if (!text.trim()) return;

        const type = (script.attr('type') || '').toLowerCase();
        if (JSON_SCRIPT_TYPES.includes(type)) {
            const parsed = tryParseJson(text);
            if (parsed !== undefined) roots.push(parsed);
            return;
        }

        for (const match of text.matchAll(STATE_ASSIGNMENT)) {
            const start = (match.index ?? 0) + match[0].length;
            const slice = sliceBalanced(text, start);
            const parsed = slice === undefined ? undefined : tryParseJson(slice);
            if (parsed !== undefined) roots.push(parsed);
        }
    });

    return roots;
}
