import type { LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ALL_PLATFORMS, Platform } from '../common/interfaces';
import type { FeedSourceDescriptor } from '../content/interfaces';
import {
  LEDGER_DRIVERS,
  LOG_LEVELS,
  type LedgerDriver,
  type LogLevelName,
} from './env.validation';

export const DEFAULT_FEED_URLS = [
  'https://rss.nytimes.com/services/xml/rss/nyt/HomePage.xml',
  'https://feeds.bbci.co.uk/news/rss.xml',
  'https://www.theguardian.com/world/rss',
];

export interface RetryPolicy {
  /**
   * Total attempts per platform call, first one included
   */
  maxAttempts: number;
  /**
   * Delay before the second attempt; doubled for every further one
   */
  baseDelayMs: number;
}

const readNumber = (
  configService: ConfigService,
  key: string,
  fallback: number,
): number => {
  const value = Number(configService.get<number | string>(key, fallback));
  return Number.isFinite(value) ? value : fallback;
};

const readList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

/**
 * RSS feeds first, then VisualPing checks, each in the order listed
 */
export const getFeedSources = (
  configService: ConfigService,
): FeedSourceDescriptor[] => {
  const urls = readList(configService.get<string>('FEED_URLS'));
  const apiKey = configService.get<string>('VISUALPING_API_KEY');

  const feeds = (urls.length > 0 ? urls : DEFAULT_FEED_URLS).map(
    (url): FeedSourceDescriptor => ({ kind: 'rss', url }),
  );
  const checks = readList(configService.get<string>('VISUALPING_URL_IDS')).map(
    (urlId): FeedSourceDescriptor =>
      apiKey
        ? { kind: 'visualping', urlId, apiKey }
        : { kind: 'visualping', urlId },
  );

  return [...feeds, ...checks];
};

export const getMaxItemsPerFeed = (configService: ConfigService): number =>
  readNumber(configService, 'MAX_ITEMS_PER_FEED', 2);

/**
 * Target platforms in dependency order, whatever order they were listed in
 */
export const getTargetPlatforms = (
  configService: ConfigService,
): Platform[] => {
  const listed = readList(configService.get<string>('TARGET_PLATFORMS')).map(
    (name) => name.toLowerCase(),
  );
  if (listed.length === 0) {
    return [...ALL_PLATFORMS];
  }
  return ALL_PLATFORMS.filter((platform) => listed.includes(platform));
};

export const getTokensDir = (configService: ConfigService): string =>
  configService.get<string>('TOKENS_DIR', '.');

/**
 * Ledger driver from a raw LEDGER_DRIVER value. Read from the raw environment
 * because the ledger module is assembled while the imports are declared.
 */
export const parseLedgerDriver = (value: string | undefined): LedgerDriver =>
  LEDGER_DRIVERS.find(
    (driver) => driver === (value ?? '').trim().toLowerCase(),
  ) ?? 'csv';

export const getLedgerPath = (configService: ConfigService): string =>
  configService.get<string>('LEDGER_PATH', 'data.csv');

export const getGraphApiBaseUrl = (configService: ConfigService): string =>
  `https://graph.facebook.com/${configService.get<string>('GRAPH_API_VERSION', 'v18.0')}`;

export const getHttpTimeoutMs = (configService: ConfigService): number =>
  readNumber(configService, 'HTTP_TIMEOUT_MS', 15000);

export const getRetryPolicy = (configService: ConfigService): RetryPolicy => ({
  maxAttempts: Math.max(1, readNumber(configService, 'POST_MAX_ATTEMPTS', 2)),
  baseDelayMs: readNumber(configService, 'POST_RETRY_DELAY_MS', 2000),
});

export const getItemDelayMs = (configService: ConfigService): number =>
  readNumber(configService, 'ITEM_DELAY_MS', 30000);

export const getRunSummaryPath = (
  configService: ConfigService,
): string | undefined => configService.get<string>('RUN_SUMMARY_PATH');

const LOGGER_LEVELS: Record<LogLevelName, LogLevel[]> = {
  error: ['error'],
  warn: ['error', 'warn'],
  log: ['error', 'warn', 'log'],
  debug: ['error', 'warn', 'log', 'debug'],
  verbose: ['error', 'warn', 'log', 'debug', 'verbose'],
};

/**
 * Logger levels for the application context. Read from the raw environment
 * because the logger is set up before ConfigModule loads.
 */
export const getLoggerLevels = (level: string | undefined): LogLevel[] => {
  const name = LOG_LEVELS.find(
    (candidate) => candidate === (level ?? 'log').toLowerCase(),
  );
  return LOGGER_LEVELS[name ?? 'log'];
};
