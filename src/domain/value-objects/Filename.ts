import { MediaKind } from '../entities/Media';

export const FILENAME_PREFIX = 'twitter';

/**
 * Value object for output filenames of the form
 * `twitter_<kind>_<unixSeconds>[_<n>].<ext>`
 */
export class Filename {
  private static readonly EXTENSION_PATTERN = /^[a-z0-9]{1,5}$/;

  private constructor(
    public readonly kind: MediaKind,
    public readonly timestamp: number,
    public readonly extension: string,
    public readonly counter: number = 0
  ) {}

  /**
   * Create filename with timestamp
   */
  static forMedia(kind: MediaKind, timestamp: number, extension: string): Filename {
    const ext = extension.replace(/^\./, '').toLowerCase();
    if (!Filename.EXTENSION_PATTERN.test(ext)) {
      throw new InvalidFilenameError(`Invalid extension: ${extension}`);
    }
    if (!Number.isInteger(timestamp) || timestamp < 0) {
      throw new InvalidFilenameError(`Invalid timestamp: ${timestamp}`);
    }
    return new Filename(kind, timestamp, ext);
  }

  /**
   * Create filename with counter
   */
  withCounter(counter: number): Filename {
    return new Filename(this.kind, this.timestamp, this.extension, counter);
  }

  /**
   * Get filename without extension
   */
  getBasename(): string {
    const suffix = this.counter > 0 ? `_${this.counter}` : '';
    return `${FILENAME_PREFIX}_${this.kind}_${this.timestamp}${suffix}`;
  }

  /**
   * Get file extension (including dot)
   */
  getExtension(): string {
    return `.${this.extension}`;
  }

  toString(): string {
    return this.getBasename() + this.getExtension();
  }

  /**
   * Check if two filenames are equal
   */
  equals(other: Filename): boolean {
    return this.toString() === other.toString();
  }
}

/**
 * Error for invalid filenames
 */
export class InvalidFilenameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFilenameError';
  }
}
