/**
 * Kinds of media a post can carry. The values double as the filename tag.
 */
export enum MediaKind {
  PHOTO = 'photo',
  VIDEO = 'video',
  ANIMATED_GIF = 'gif'
}

/**
 * One quality/encoding option of a media item
 */
export interface MediaVariant {
  url: string;
  contentType?: string;
  bitrate?: number;
  width?: number;
  height?: number;
}

const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp', 'gif'];

/**
 * One photo, video or animated GIF attached to a post, with the variant
 * chosen for download
 */
export class MediaEntry {
  constructor(
    public readonly index: number,
    public readonly kind: MediaKind,
    public readonly variants: readonly MediaVariant[],
    public readonly source: MediaVariant,
    public readonly mediaKey?: string
  ) {}

  /**
   * Check if media is delivered as a video container
   */
  isVideoLike(): boolean {
    return this.kind === MediaKind.VIDEO || this.kind === MediaKind.ANIMATED_GIF;
  }

  /**
   * File extension (without the dot) for the selected variant
   */
  getFileExtension(): string {
    if (this.isVideoLike()) {
      return isHlsVariant(this.source) ? 'm3u8' : 'mp4';
    }
    return imageExtension(this.source.url);
  }
}

export function isHlsVariant(variant: MediaVariant): boolean {
  const type = (variant.contentType || '').toLowerCase();
  return type.includes('mpegurl') || urlPath(variant.url).endsWith('.m3u8');
}

export function isMp4Variant(variant: MediaVariant): boolean {
  if (variant.contentType) {
    return variant.contentType.toLowerCase() === 'video/mp4';
  }
  return urlPath(variant.url).endsWith('.mp4');
}

/**
 * Image extension from the URL path (`.../abc.png:orig`) or its `format`
 * query parameter, `jpg` when neither names a known image type
 */
export function imageExtension(url: string): string {
  const pathname = urlPath(url).replace(/:[a-z]+$/, '');
  const match = pathname.match(/\.([a-z0-9]+)$/);
  if (match && IMAGE_EXTENSIONS.includes(match[1])) {
    return match[1];
  }

  try {
    const format = new URL(url).searchParams.get('format');
    if (format && IMAGE_EXTENSIONS.includes(format.toLowerCase())) {
      return format.toLowerCase();
    }
  } catch {
    return 'jpg';
  }

  return 'jpg';
}

function urlPath(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.split(/[?#]/)[0].toLowerCase();
  }
}
