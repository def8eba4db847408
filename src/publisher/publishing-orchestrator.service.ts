import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ContentItem,
  Platform,
  PlatformCredentials,
  PostResult,
  RETRYABLE_ERROR_KINDS,
} from '../common/interfaces';
import { NoUsablePlatformError } from '../common/errors';
import { sleep } from '../common/utils/sleep';
import {
  getItemDelayMs,
  getMaxItemsPerFeed,
  getRetryPolicy,
  getTargetPlatforms,
  RetryPolicy,
} from '../config/publisher.config';
import { ContentSource } from '../content/content-source.service';
import { createFetchReport } from '../content/interfaces';
import { RedundancyLedger } from '../ledger/redundancy-ledger.service';
import { MediaGate } from '../media/media-gate.service';
import { FacebookPoster } from '../platforms/facebook/facebook.poster';
import { InstagramPoster } from '../platforms/instagram/instagram.poster';
import { failedPost } from '../platforms/utils/graph-api';
import { TokenStore } from '../tokens/token-store.service';
import {
  ItemReport,
  PlatformOutcome,
  RunSummary,
  SkipReason,
} from './interfaces';
import { RunReporter } from './run-reporter.service';

type Readiness =
  | { ready: true; credentials: PlatformCredentials }
  | { ready: false; reason: SkipReason };

interface RunState {
  targets: Platform[];
  credentials: Map<Platform, PlatformCredentials>;
  /**
   * An earlier item made platform calls and the next call must wait
   */
  throttlePending: boolean;
}

interface ItemState {
  item: ContentItem;
  outcomes: ItemReport['outcomes'];
  callsMade: boolean;
}

/**
 * Publishing Orchestrator
 * Runs one pass: fetch items, then per item publish to Facebook and, once
 * Facebook holds the item, to Instagram. Items are handled strictly one at
 * a time and every platform outcome reaches the ledger before the next
 * platform or item starts.
 */
@Injectable()
export class PublishingOrchestrator {
  private readonly logger = new Logger(PublishingOrchestrator.name);
  private readonly targets: Platform[];
  private readonly maxItems: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly itemDelayMs: number;

  constructor(
    configService: ConfigService,
    private readonly ledger: RedundancyLedger,
    private readonly tokenStore: TokenStore,
    private readonly contentSource: ContentSource,
    private readonly mediaGate: MediaGate,
    private readonly facebookPoster: FacebookPoster,
    private readonly instagramPoster: InstagramPoster,
    private readonly reporter: RunReporter,
  ) {
    this.targets = getTargetPlatforms(configService);
    this.maxItems = getMaxItemsPerFeed(configService);
    this.retryPolicy = getRetryPolicy(configService);
    this.itemDelayMs = getItemDelayMs(configService);
  }

  async run(): Promise<RunSummary> {
    const startedAt = new Date();

    await this.ledger.load();

    const inspections = await this.tokenStore.preflight(this.targets);
    const credentials = new Map<Platform, PlatformCredentials>();
    for (const [platform, inspection] of inspections) {
      if (inspection.status === 'valid') {
        credentials.set(platform, inspection.credentials);
      }
    }
    if (credentials.size === 0) {
      throw new NoUsablePlatformError(this.targets);
    }

    const state: RunState = {
      targets: this.targets,
      credentials,
      throttlePending: false,
    };
    const fetchReport = createFetchReport();
    const summary: RunSummary = {
      startedAt,
      finishedAt: startedAt,
      targets: [...this.targets],
      unavailablePlatforms: this.targets.filter(
        (platform) => !credentials.has(platform),
      ),
      fetched: 0,
      filtered: 0,
      duplicates: 0,
      posted: { [Platform.FACEBOOK]: 0, [Platform.INSTAGRAM]: 0 },
      skipped: 0,
      failed: 0,
      sourceFailures: fetchReport.sourceFailures,
      items: [],
    };

    this.logger.log(
      `Publishing to ${this.targets.join(', ')} from ${this.maxItems} item(s) per feed`,
    );

    for await (const item of this.contentSource.fetch(
      this.maxItems,
      fetchReport,
    )) {
      if (this.ledger.alreadyProcessed(item.fingerprint, this.targets)) {
        summary.filtered++;
        this.logger.debug(`Already published everywhere: ${item.title}`);
        continue;
      }

      const itemState = await this.processItem(item, state);
      if (itemState.callsMade) {
        state.throttlePending = true;
      }

      const report: ItemReport = {
        fingerprint: item.fingerprint,
        title: item.title,
        link: item.link,
        outcomes: itemState.outcomes,
      };
      this.tally(summary, report);
      summary.items.push(report);
      this.reporter.itemCompleted(report);
    }

    summary.fetched = fetchReport.fetched;
    summary.duplicates = fetchReport.duplicates;
    summary.finishedAt = new Date();

    await this.reporter.runCompleted(summary);
    return summary;
  }

  private async processItem(
    item: ContentItem,
    state: RunState,
  ): Promise<ItemState> {
    const itemState: ItemState = { item, outcomes: {}, callsMade: false };

    if (state.targets.includes(Platform.FACEBOOK)) {
      itemState.outcomes[Platform.FACEBOOK] = await this.publishFacebook(
        itemState,
        state,
      );
    }

    if (state.targets.includes(Platform.INSTAGRAM)) {
      itemState.outcomes[Platform.INSTAGRAM] = await this.publishInstagram(
        itemState,
        state,
      );
    }

    return itemState;
  }

  private async publishFacebook(
    itemState: ItemState,
    state: RunState,
  ): Promise<PlatformOutcome> {
    const readiness = this.readiness(itemState.item, Platform.FACEBOOK, state);
    if (!readiness.ready) {
      return { status: 'skipped', reason: readiness.reason };
    }

    return this.attempt(itemState, state, Platform.FACEBOOK, () =>
      this.facebookPoster.post(itemState.item, readiness.credentials),
    );
  }

  private async publishInstagram(
    itemState: ItemState,
    state: RunState,
  ): Promise<PlatformOutcome> {
    const { item } = itemState;
    const readiness = this.readiness(item, Platform.INSTAGRAM, state);
    if (!readiness.ready) {
      return { status: 'skipped', reason: readiness.reason };
    }

    // Set by this run's Facebook success, or recorded by an earlier run
    const parentReference = this.ledger.postReference(
      item.fingerprint,
      Platform.FACEBOOK,
    );
    if (!parentReference) {
      return { status: 'skipped', reason: SkipReason.PARENT_NOT_POSTED };
    }

    return this.attempt(itemState, state, Platform.INSTAGRAM, () =>
      this.instagramPoster.post(item, readiness.credentials, parentReference),
    );
  }

  /**
   * Ledger first, then credentials, then media
   */
  private readiness(
    item: ContentItem,
    platform: Platform,
    state: RunState,
  ): Readiness {
    if (this.ledger.isPosted(item.fingerprint, platform)) {
      return { ready: false, reason: SkipReason.ALREADY_POSTED };
    }

    const credentials = state.credentials.get(platform);
    if (!credentials) {
      return { ready: false, reason: SkipReason.AUTH_INVALID };
    }

    if (!this.mediaGate.isEligible(item, platform)) {
      return { ready: false, reason: SkipReason.NO_MEDIA };
    }

    return { ready: true, credentials };
  }

  /**
   * Calls the platform with retries on transient failures, then records
   * the final result in the ledger
   */
  private async attempt(
    itemState: ItemState,
    state: RunState,
    platform: Platform,
    call: () => Promise<PostResult>,
  ): Promise<PlatformOutcome> {
    if (!itemState.callsMade && state.throttlePending) {
      this.logger.debug(`Waiting ${this.itemDelayMs}ms before the next item`);
      await sleep(this.itemDelayMs);
      state.throttlePending = false;
    }
    itemState.callsMade = true;

    const { item } = itemState;
    let attempts = 1;
    let result = await this.callOnce(platform, call);

    while (
      !result.success &&
      RETRYABLE_ERROR_KINDS.has(result.errorKind) &&
      attempts < this.retryPolicy.maxAttempts
    ) {
      const delayMs = this.retryPolicy.baseDelayMs * 2 ** (attempts - 1);
      this.logger.warn(
        `${platform} attempt ${attempts} for "${item.title}" failed (${result.errorKind}), retrying in ${delayMs}ms`,
      );
      await sleep(delayMs);
      attempts++;
      result = await this.callOnce(platform, call);
    }

    await this.ledger.record(item.fingerprint, platform, result);

    if (result.success) {
      this.logger.log(
        `Published "${item.title}" to ${platform}: ${result.postReference.url}`,
      );
      return {
        status: 'posted',
        postReference: result.postReference,
        attempts,
      };
    }

    this.logger.error(
      `Could not publish "${item.title}" to ${platform} (${result.errorKind}): ${result.error}`,
    );
    return {
      status: 'failed',
      errorKind: result.errorKind,
      error: result.error,
      attempts,
    };
  }

  private async callOnce(
    platform: Platform,
    call: () => Promise<PostResult>,
  ): Promise<PostResult> {
    try {
      return await call();
    } catch (error) {
      return failedPost(platform, error);
    }
  }

  private tally(summary: RunSummary, report: ItemReport): void {
    for (const platform of summary.targets) {
      const outcome = report.outcomes[platform];
      switch (outcome?.status) {
        case 'posted':
          summary.posted[platform]++;
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'skipped':
          summary.skipped++;
          break;
      }
    }
  }
}
