import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ContentItem } from '../common/interfaces';
import { getErrorMessage } from '../common/utils/error.utils';
import { getFeedSources } from '../config/publisher.config';
import { normalizeItem } from './content-normalizer';
import {
  createFetchReport,
  FeedFetcher,
  FeedSourceDescriptor,
  FetchReport,
  RawFeedItem,
  RssFeedSource,
  sourceLocation,
  VisualPingSource,
} from './interfaces';
import { RssFeedFetcher } from './rss-feed.fetcher';
import { VisualPingFetcher } from './visualping.fetcher';

interface SourceFetchers {
  rss: FeedFetcher<RssFeedSource>;
  visualping: FeedFetcher<VisualPingSource>;
}

/**
 * Content Source
 * Aggregates the configured feeds, in priority order, into normalized items.
 * A failing feed is reported and skipped; the others still contribute.
 */
@Injectable()
export class ContentSource {
  private readonly logger = new Logger(ContentSource.name);
  private readonly fetchers: SourceFetchers;
  private readonly sources: FeedSourceDescriptor[];

  constructor(
    configService: ConfigService,
    rssFeedFetcher: RssFeedFetcher,
    visualPingFetcher: VisualPingFetcher,
  ) {
    this.sources = getFeedSources(configService);
    this.fetchers = {
      rss: rssFeedFetcher,
      visualping: visualPingFetcher,
    };
  }

  get configuredSources(): readonly FeedSourceDescriptor[] {
    return this.sources;
  }

  /**
   * Lazily yields items from every source. Items sharing a fingerprint are
   * yielded once, first source wins. Each call fetches from scratch.
   * @param maxItems - cap per source
   * @param report - receives per-source failures and counts as iteration proceeds
   */
  async *fetch(
    maxItems: number,
    report: FetchReport = createFetchReport(),
  ): AsyncGenerator<ContentItem, void, undefined> {
    const seen = new Set<string>();

    for (const source of this.sources) {
      report.sourcesAttempted++;
      const location = sourceLocation(source);

      let rawItems: RawFeedItem[];
      try {
        rawItems = await this.fetchSource(source, maxItems);
      } catch (error) {
        const message = getErrorMessage(error);
        report.sourceFailures.push({ source: location, message });
        this.logger.warn(`Skipping source ${location}: ${message}`);
        continue;
      }

      this.logger.log(`Retrieved ${rawItems.length} item(s) from ${location}`);

      for (const raw of rawItems) {
        const item = normalizeItem(raw, source);

        if (seen.has(item.fingerprint)) {
          report.duplicates++;
          this.logger.debug(`Duplicate of an earlier item dropped: ${item.title}`);
          continue;
        }

        seen.add(item.fingerprint);
        report.fetched++;
        yield item;
      }
    }
  }

  private async fetchSource(
    source: FeedSourceDescriptor,
    maxItems: number,
  ): Promise<RawFeedItem[]> {
    switch (source.kind) {
      case 'rss':
        return this.fetchers.rss.fetch(source, maxItems);
      case 'visualping':
        return this.fetchers.visualping.fetch(source, maxItems);
    }
  }
}
