import type { CheerioAPI } from 'cheerio';
import { MediaEntry } from '../entities/Media';
import { PostReference } from '../value-objects/PostReference';
import { PageContent } from './IPageFetcher';

/**
 * Page content parsed once and shared by every extraction strategy
 */
export interface PageDocument {
  readonly content: PageContent;
  readonly post: PostReference;
  /** Whether the whole body is a JSON document */
  readonly isJson: boolean;
  /** The body itself when it is JSON, otherwise the JSON payloads embedded in scripts */
  readonly jsonRoots: readonly unknown[];
  /** Markup view of the body, loaded on first use */
  dom(): CheerioAPI;
}

/**
 * One way of finding media in a page. Returns null (or an empty list)
 * when its shape is not present.
 */
export interface IExtractionStrategy {
  readonly name: string;
  tryExtract(document: PageDocument): MediaEntry[] | null;
}

export interface IMediaExtractor {
  extract(content: PageContent): MediaEntry[];
}
