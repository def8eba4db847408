/**
 * An RSS 2.0 or Atom feed reachable over HTTP
 */
export interface RssFeedSource {
  kind: 'rss';
  url: string;
  /**
   * Display name; the feed's own title is used when omitted
   */
  label?: string;
}

/**
 * A page watched by VisualPing; its latest check becomes at most one item
 */
export interface VisualPingSource {
  kind: 'visualping';
  urlId: string;
  apiKey?: string;
  label?: string;
  /**
   * Drop checks without visual changes. Defaults to true.
   */
  requireMedia?: boolean;
}

/**
 * Configured content sources, tagged by kind
 */
export type FeedSourceDescriptor = RssFeedSource | VisualPingSource;

export type FeedSourceKind = FeedSourceDescriptor['kind'];

export const VISUALPING_CHECK_URL = 'https://visualping.io/check';

/**
 * Where a source lives, for logs, failure reports and domain fallback
 */
export const sourceLocation = (source: FeedSourceDescriptor): string => {
  switch (source.kind) {
    case 'rss':
      return source.url;
    case 'visualping':
      return `${VISUALPING_CHECK_URL}/${source.urlId}`;
  }
};

/**
 * Media as announced by the feed, before classification
 */
export interface RawMedia {
  url: string;
  /**
   * MIME type from an enclosure or media:content
   */
  type?: string;
  /**
   * media:content medium attribute, or the HTML tag it came from
   */
  medium?: string;
  width?: number;
  height?: number;
}

export interface RawFeedItem {
  guid: string;
  link: string;
  title: string;
  author: string;
  /**
   * Body as published: HTML or plain text
   */
  html: string;
  /**
   * Date string as found in the feed
   */
  published: string;
  feedTitle: string;
  media: RawMedia[];
}

/**
 * Retrieval capability for one kind of source
 */
export interface FeedFetcher<
  S extends FeedSourceDescriptor = FeedSourceDescriptor,
> {
  readonly kind: S['kind'];

  fetch(source: S, maxItems: number): Promise<RawFeedItem[]>;
}

export interface SourceFailure {
  source: string;
  message: string;
}

/**
 * Filled in while a ContentSource fetch is iterated
 */
export interface FetchReport {
  sourcesAttempted: number;
  sourceFailures: SourceFailure[];
  fetched: number;
  duplicates: number;
}

export const createFetchReport = (): FetchReport => ({
  sourcesAttempted: 0,
  sourceFailures: [],
  fetched: 0,
  duplicates: 0,
});
