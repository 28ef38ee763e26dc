import { InvalidUrlError } from '../../shared/errors/AppError';

export type PostHost = 'x.com' | 'twitter.com';

const HOST_PATTERN = /^(?:www\.|mobile\.)?(x\.com|twitter\.com)$/;
const HANDLE_PATTERN = /^[A-Za-z0-9_]{1,15}$/;
const ID_PATTERN = /^\d+$/;

/**
 * Value object identifying one post by author handle and numeric ID
 */
export class PostReference {
  private constructor(
    public readonly handle: string,
    public readonly id: string,
    public readonly host: PostHost
  ) {}

  /**
   * Parse `https://x.com/<handle>/status/<id>` or the twitter.com
   * equivalent. Query string, fragment and trailing segments such as
   * `/photo/1` are ignored.
   */
  static parse(input: string): PostReference {
    let url: URL;
    try {
      url = new URL(input.trim());
    } catch {
      throw new InvalidUrlError(input, 'not a URL');
    }

    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new InvalidUrlError(input, `unsupported protocol ${url.protocol}`);
    }

    const hostMatch = url.hostname.toLowerCase().match(HOST_PATTERN);
    if (!hostMatch) {
      throw new InvalidUrlError(input, `unsupported domain ${url.hostname}`);
    }

    const segments = url.pathname.split('/').filter(Boolean);
    if (segments.length < 3 || segments[1].toLowerCase() !== 'status') {
      throw new InvalidUrlError(input, 'expected /<handle>/status/<id>');
    }

    const [handle, , id] = segments;
    if (!HANDLE_PATTERN.test(handle)) {
      throw new InvalidUrlError(input, `invalid handle '${handle}'`);
    }
    if (!ID_PATTERN.test(id)) {
      throw new InvalidUrlError(input, `post ID '${id}' is not numeric`);
    }

    return new PostReference(handle, id, toPostHost(hostMatch[1]));
  }

  /**
   * Canonical page URL of the post
   */
  get normalizedUrl(): string {
    return `https://x.com/${this.handle}/status/${this.id}`;
  }

  /**
   * Public embed JSON endpoint for the post
   */
  get syndicationUrl(): string {
    return `https://cdn.syndication.twimg.com/widgets/tweet?id=${this.id}&lang=en`;
  }

  toString(): string {
    return this.normalizedUrl;
  }

  equals(other: PostReference): boolean {
    return this.id === other.id;
  }
}

function toPostHost(host: string): PostHost {
  return host === 'twitter.com' ? 'twitter.com' : 'x.com';
}
