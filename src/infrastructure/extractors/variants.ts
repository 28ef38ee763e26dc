import { MediaVariant, isHlsVariant, isMp4Variant } from '../../domain/entities/Media';

export interface VariantSelectionOptions {
    /** Let HLS playlists compete with MP4 files */
    includeHls?: boolean;
}

export interface Resolution {
    width: number;
    height: number;
}

/**
 * Width and height from a `/<w>x<h>/` path segment, as in
 * `video.twimg.com/ext_tw_video/<id>/pu/vid/1280x720/<name>.mp4`
 */
export function parseResolution(url: string): Resolution | undefined {
    const match = url.match(/\/(\d{2,5})x(\d{2,5})\//);
    if (!match) return undefined;
    return { width: Number(match[1]), height: Number(match[2]) };
}

export function pixelArea(variant: MediaVariant): number {
    if (variant.width && variant.height) {
        return variant.width * variant.height;
    }
    const resolution = parseResolution(variant.url);
    return resolution ? resolution.width * resolution.height : 0;
}

/**
 * Positive when a ranks above b: higher bitrate first (a missing bitrate
 * ranks below any declared one), then larger area
 */
export function compareVariants(a: MediaVariant, b: MediaVariant): number {
    const bitrateA = a.bitrate ?? -1;
    const bitrateB = b.bitrate ?? -1;
    if (bitrateA !== bitrateB) {
        return bitrateA - bitrateB;
    }
    return pixelArea(a) - pixelArea(b);
}

export function downloadableVariants(
    variants: readonly MediaVariant[],
    options: VariantSelectionOptions = {}
): MediaVariant[] {
    return variants.filter(variant => isMp4Variant(variant) || (options.includeHls === true && isHlsVariant(variant)));
}

/**
 * Best downloadable variant; the first listed wins full ties
 */
export function selectBestVariant(
    variants: readonly MediaVariant[],
    options: VariantSelectionOptions = {}
): MediaVariant | undefined {
    let best: MediaVariant | undefined;
    for (const variant of downloadableVariants(variants, options)) {
        if (!best || compareVariants(variant, best) > 0) {
            best = variant;
        }
    }
    return best;
}
