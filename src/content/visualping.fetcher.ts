import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SourceFetchError } from '../common/errors';
import { getErrorMessage } from '../common/utils/error.utils';
import { getHttpTimeoutMs } from '../config/publisher.config';
import {
  FeedFetcher,
  RawFeedItem,
  RawMedia,
  sourceLocation,
  VisualPingSource,
} from './interfaces';

export const VISUALPING_API_URL = 'https://api.visualping.io/v1';

const VISUAL_CHANGE_HINTS = ['visual', 'image', 'layout', 'design'];
const SCREENSHOT_FIELDS = ['after_screenshot', 'screenshot'] as const;

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringField = (record: JsonRecord, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
};

const numberField = (record: JsonRecord, key: string): number => {
  const value = Number(record[key] ?? 0);
  return Number.isFinite(value) ? value : 0;
};

const hostnameOf = (url: string): string => {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
};

/**
 * Whether a check reports a visual change: a visual change type, more than
 * 5% of the page changed, or a screenshot attached
 */
export function hasVisualChange(check: JsonRecord): boolean {
  const changeType = (stringField(check, 'change_type') ?? '').toLowerCase();
  return (
    VISUAL_CHANGE_HINTS.some((hint) => changeType.includes(hint)) ||
    numberField(check, 'change_percentage') > 5 ||
    'screenshot' in check ||
    'before_screenshot' in check
  );
}

function screenshots(check: JsonRecord): RawMedia[] {
  return SCREENSHOT_FIELDS.map((field) => stringField(check, field))
    .filter((url): url is string => url !== undefined)
    .map((url) => ({ url, medium: 'image' }));
}

/**
 * Turns a VisualPing check response into zero or one raw item.
 * Only checks in the `changed` state produce an item.
 */
export function parseVisualPingCheck(
  body: unknown,
  source: VisualPingSource,
): RawFeedItem[] {
  const check = isRecord(body) && isRecord(body.check) ? body.check : {};
  if (stringField(check, 'state') !== 'changed') {
    return [];
  }

  const visual = hasVisualChange(check);
  if ((source.requireMedia ?? true) && !visual) {
    return [];
  }

  const url = stringField(check, 'url') ?? sourceLocation(source);
  const detectedAt = stringField(check, 'detected_at') ?? '';
  const lines = [
    `${visual ? 'Visual content' : 'Content'} change detected on ${url}`,
    `Change type: ${stringField(check, 'change_type') ?? 'unknown'}`,
    `Change percentage: ${numberField(check, 'change_percentage')}%`,
  ];
  if (detectedAt) {
    lines.push(`Detected at: ${detectedAt}`);
  }

  return [
    {
      guid: `visualping:${source.urlId}:${detectedAt}`,
      link: url,
      title: `VisualPing Alert: Changed - ${hostnameOf(url)}`,
      author: 'VisualPing',
      html: lines.join('\n'),
      published: detectedAt,
      feedTitle: 'VisualPing',
      media: visual ? screenshots(check) : [],
    },
  ];
}

/**
 * VisualPing Fetcher
 * Reads the latest check of one monitored page from the VisualPing API.
 */
@Injectable()
export class VisualPingFetcher implements FeedFetcher<VisualPingSource> {
  readonly kind = 'visualping';
  private readonly logger = new Logger(VisualPingFetcher.name);
  private readonly timeoutMs: number;

  constructor(configService: ConfigService) {
    this.timeoutMs = getHttpTimeoutMs(configService);
  }

  async fetch(
    source: VisualPingSource,
    maxItems: number,
  ): Promise<RawFeedItem[]> {
    const location = sourceLocation(source);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (source.apiKey) {
      headers.Authorization = `Bearer ${source.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(
        `${VISUALPING_API_URL}/checks/${encodeURIComponent(source.urlId)}`,
        { headers, signal: AbortSignal.timeout(this.timeoutMs) },
      );
    } catch (error) {
      const timedOut =
        error instanceof Error &&
        (error.name === 'TimeoutError' || error.name === 'AbortError');
      throw new SourceFetchError(
        location,
        timedOut
          ? `timed out after ${this.timeoutMs}ms`
          : getErrorMessage(error),
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new SourceFetchError(location, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SourceFetchError(location, 'response is not JSON', {
        cause: error,
      });
    }

    const items = parseVisualPingCheck(body, source).slice(
      0,
      Math.max(0, maxItems),
    );
    this.logger.debug(`${location}: ${items.length} item(s)`);
    return items;
  }
}
