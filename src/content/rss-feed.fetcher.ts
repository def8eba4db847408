import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { SourceFetchError } from '../common/errors';
import { getErrorMessage } from '../common/utils/error.utils';
import { getHttpTimeoutMs } from '../config/publisher.config';
import {
  FeedFetcher,
  RawFeedItem,
  RawMedia,
  RssFeedSource,
} from './interfaces';

const toDimension = (value: string | undefined): number | undefined => {
  const parsed = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

function mediaFromAttributes(
  node: Cheerio<Element>,
  urlAttribute: string,
  medium?: string,
): RawMedia | undefined {
  const url = node.attr(urlAttribute)?.trim();
  if (!url) {
    return undefined;
  }
  return {
    url,
    type: node.attr('type'),
    medium: node.attr('medium') ?? medium,
    width: toDimension(node.attr('width')),
    height: toDimension(node.attr('height')),
  };
}

/**
 * Images and videos embedded in an item body
 */
function mediaFromHtml(html: string): RawMedia[] {
  if (!html.includes('<img') && !html.includes('<video')) {
    return [];
  }

  const $ = load(html);
  const media: RawMedia[] = [];

  $('video[src], video source[src]').each((_, el) => {
    const found = mediaFromAttributes($(el), 'src', 'video');
    if (found) media.push(found);
  });
  $('img[src]').each((_, el) => {
    const found = mediaFromAttributes($(el), 'src', 'image');
    if (found) media.push(found);
  });

  return media;
}

function collectMedia(
  $: CheerioAPI,
  entry: Cheerio<Element>,
  html: string,
): RawMedia[] {
  const media: RawMedia[] = [];
  const push = (found: RawMedia | undefined) => {
    if (found) media.push(found);
  };

  entry
    .find('enclosure')
    .each((_, el) => push(mediaFromAttributes($(el), 'url')));
  entry
    .find('link[rel="enclosure"]')
    .each((_, el) => push(mediaFromAttributes($(el), 'href')));
  entry
    .find('media\\:content')
    .each((_, el) => push(mediaFromAttributes($(el), 'url')));
  entry
    .find('media\\:thumbnail')
    .each((_, el) => push(mediaFromAttributes($(el), 'url', 'image')));

  media.push(...mediaFromHtml(html));
  return media;
}

function parseRssItem(
  $: CheerioAPI,
  entry: Cheerio<Element>,
  feedTitle: string,
): RawFeedItem {
  const html =
    entry.children('content\\:encoded').first().text() ||
    entry.children('description').first().text();

  return {
    guid: entry.children('guid').first().text().trim(),
    link: entry.children('link').first().text().trim(),
    title: entry.children('title').first().text(),
    author:
      entry.children('author').first().text() ||
      entry.children('dc\\:creator').first().text(),
    html,
    published:
      entry.children('pubDate').first().text() ||
      entry.children('dc\\:date').first().text(),
    feedTitle,
    media: collectMedia($, entry, html),
  };
}

function parseAtomEntry(
  $: CheerioAPI,
  entry: Cheerio<Element>,
  feedTitle: string,
): RawFeedItem {
  const html =
    entry.children('content').first().text() ||
    entry.children('summary').first().text();
  const link =
    entry.children('link[rel="alternate"]').attr('href') ??
    entry.children('link:not([rel])').attr('href') ??
    '';

  return {
    guid: entry.children('id').first().text().trim(),
    link: link.trim(),
    title: entry.children('title').first().text(),
    author: entry.find('author > name').first().text(),
    html,
    published:
      entry.children('published').first().text() ||
      entry.children('updated').first().text(),
    feedTitle,
    media: collectMedia($, entry, html),
  };
}

/**
 * Parses RSS 2.0 or Atom XML into raw items, in feed order
 */
export function parseFeedXml(xml: string): RawFeedItem[] {
  const $ = load(xml, { xml: true });
  const isAtom = $('feed').length > 0;
  const feedTitle = $('channel > title, feed > title').first().text().trim();

  const entries = isAtom ? $('feed > entry') : $('item');

  return entries
    .toArray()
    .map((el) =>
      isAtom
        ? parseAtomEntry($, $(el), feedTitle)
        : parseRssItem($, $(el), feedTitle),
    );
}

/**
 * RSS Feed Fetcher
 * Downloads one RSS or Atom feed and returns its first entries.
 */
@Injectable()
export class RssFeedFetcher implements FeedFetcher<RssFeedSource> {
  readonly kind = 'rss';
  private readonly logger = new Logger(RssFeedFetcher.name);
  private readonly timeoutMs: number;

  constructor(configService: ConfigService) {
    this.timeoutMs = getHttpTimeoutMs(configService);
  }

  async fetch(
    source: RssFeedSource,
    maxItems: number,
  ): Promise<RawFeedItem[]> {
    let response: Response;
    try {
      response = await fetch(source.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          'User-Agent': 'feed-publisher/1.0 (+rss)',
          Accept:
            'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
      });
    } catch (error) {
      const timedOut =
        error instanceof Error &&
        (error.name === 'TimeoutError' || error.name === 'AbortError');
      throw new SourceFetchError(
        source.url,
        timedOut
          ? `timed out after ${this.timeoutMs}ms`
          : getErrorMessage(error),
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new SourceFetchError(source.url, `HTTP ${response.status}`);
    }

    const xml = await response.text();
    if (
      !xml.includes('<rss') &&
      !xml.includes('<feed') &&
      !xml.includes('<rdf:RDF')
    ) {
      throw new SourceFetchError(source.url, 'response is not RSS or Atom XML');
    }

    const items = parseFeedXml(xml).slice(0, Math.max(0, maxItems));
    this.logger.debug(`${source.url}: ${items.length} item(s)`);
    return items;
  }
}
