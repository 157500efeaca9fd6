export const DEFAULT_TAG = 'latest';

export class ImageReference {
  constructor(
    public readonly repository: string,
    public readonly tag: string = DEFAULT_TAG,
  ) {
    if (!repository) throw new Error('Image repository must not be empty');
  }

  /**
   * Parses `repo`, `repo:tag` or `registry:port/repo:tag`. A colon only separates a tag when
   * no `/` follows it, so a registry port is never mistaken for one.
   */
  static parse(image: string, fallbackTag: string = DEFAULT_TAG): ImageReference {
    const trimmed = image.trim();
    const colon = trimmed.lastIndexOf(':');
    if (colon > 0 && !trimmed.slice(colon + 1).includes('/')) {
      const tag = trimmed.slice(colon + 1);
      return new ImageReference(trimmed.slice(0, colon), tag || fallbackTag);
    }
    return new ImageReference(trimmed, fallbackTag);
  }

  withTag(tag: string | null | undefined): ImageReference {
    return new ImageReference(this.repository, tag || DEFAULT_TAG);
  }

  toString(): string {
    return `${this.repository}:${this.tag}`;
  }
}
