import { load } from 'cheerio';
import { createHash } from 'crypto';
import type {
  ContentItem,
  MediaKind,
  MediaRef,
} from '../common/interfaces';
import {
  sourceLocation,
  type FeedSourceDescriptor,
  type RawFeedItem,
  type RawMedia,
} from './interfaces';

export const MAX_BODY_LENGTH = 3000;

const collapseWhitespace = (text: string): string =>
  text.replace(/\s+/g, ' ').trim();

/**
 * Plain text of an HTML fragment, whitespace collapsed
 */
export function htmlToText(html: string): string {
  if (!html.includes('<') && !html.includes('&')) {
    return collapseWhitespace(html);
  }
  return collapseWhitespace(load(html).text());
}

export function clipText(text: string, maxLength: number): string {
  return text.length > maxLength
    ? `${text.substring(0, maxLength - 3)}...`
    : text;
}

/**
 * Hostname of a URL, lower-cased, or '' when it does not parse
 */
export function domainOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * ISO timestamp of a feed date (RFC 822 or ISO-8601), or null
 */
export function parsePublished(value: string): string | null {
  if (!value.trim()) {
    return null;
  }
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Deduplication key over title, source domain and publication day.
 * Stays the same when a feed reorders entries or edits one later that day.
 */
export function computeFingerprint(
  title: string,
  sourceDomain: string,
  publishedAt: string | null,
): string {
  const day = publishedAt ? publishedAt.substring(0, 10) : '';
  const key = [
    collapseWhitespace(title).toLowerCase(),
    sourceDomain.toLowerCase(),
    day,
  ].join('|');
  return createHash('sha256').update(key, 'utf8').digest('hex');
}

export function classifyMedia(media: RawMedia): MediaKind | undefined {
  const medium = media.medium?.toLowerCase();
  const type = media.type?.toLowerCase() ?? '';

  if (medium === 'image' || type.startsWith('image/')) {
    return 'image';
  }
  if (medium === 'video' || type.startsWith('video/')) {
    return 'video';
  }
  return undefined;
}

function toMediaRefs(media: readonly RawMedia[]): MediaRef[] {
  const refs: MediaRef[] = [];
  const seen = new Set<string>();

  for (const entry of media) {
    const url = entry.url.trim();
    const kind = classifyMedia(entry);
    if (!url || !kind || seen.has(url)) {
      continue;
    }
    seen.add(url);

    const ref: MediaRef = { url, kind };
    if (entry.width !== undefined) {
      ref.width = entry.width;
    }
    if (entry.height !== undefined) {
      ref.height = entry.height;
    }
    refs.push(ref);
  }

  return refs;
}

/**
 * Turns a raw feed entry into an immutable ContentItem
 */
export function normalizeItem(
  raw: RawFeedItem,
  source: FeedSourceDescriptor,
): ContentItem {
  const title = collapseWhitespace(raw.title) || 'Untitled';
  const link = raw.link.trim();
  const sourceDomain = domainOf(link) || domainOf(sourceLocation(source));
  const publishedAt = parsePublished(raw.published);
  const fingerprint = computeFingerprint(title, sourceDomain, publishedAt);

  return Object.freeze({
    id: raw.guid.trim() || link || fingerprint,
    title,
    link,
    author: collapseWhitespace(raw.author) || 'Unknown',
    sourceDomain,
    sourceName:
      source.label || collapseWhitespace(raw.feedTitle) || sourceDomain,
    publishedAt,
    bodyText: clipText(htmlToText(raw.html), MAX_BODY_LENGTH),
    mediaRefs: Object.freeze(toMediaRefs(raw.media)),
    fingerprint,
  });
}
