import { Module } from '@nestjs/common';
import { ContentSource } from './content-source.service';
import { RssFeedFetcher } from './rss-feed.fetcher';
import { VisualPingFetcher } from './visualping.fetcher';

/**
 * Content Module
 * - RssFeedFetcher: downloads and parses RSS/Atom feeds
 * - VisualPingFetcher: reads the latest change check of a watched page
 * - ContentSource: aggregates feeds into normalized, fingerprinted items
 */
@Module({
  providers: [RssFeedFetcher, VisualPingFetcher, ContentSource],
  exports: [ContentSource],
})
export class ContentModule {}
