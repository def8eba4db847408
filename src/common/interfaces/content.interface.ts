export type MediaKind = 'image' | 'video';

export interface MediaRef {
  url: string;
  kind: MediaKind;
  width?: number;
  height?: number;
}

/**
 * One candidate article, normalized from a feed entry.
 * Created per fetch and never persisted.
 */
export interface ContentItem {
  readonly id: string;
  readonly title: string;
  readonly link: string;
  readonly author: string;
  readonly sourceDomain: string;
  readonly sourceName: string;
  /**
   * ISO-8601 timestamp, null when the feed entry carries no usable date
   */
  readonly publishedAt: string | null;
  readonly bodyText: string;
  readonly mediaRefs: readonly MediaRef[];
  /**
   * Deduplication key, stable across runs and fetch orders
   */
  readonly fingerprint: string;
}
