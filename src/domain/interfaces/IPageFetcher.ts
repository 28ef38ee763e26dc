import { PostReference } from '../value-objects/PostReference';

/**
 * Where the post is read from
 */
export type PostSource = 'page' | 'syndication';

/**
 * Raw content fetched for one post
 */
export interface PageContent {
  post: PostReference;
  source: PostSource;
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

export interface IPageFetcher {
  fetch(postUrl: string): Promise<PageContent>;
}
