import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  ContentItem,
  Platform,
  PlatformCredentials,
  PostErrorKind,
  PostResult,
} from '../common/interfaces';
import {
  LedgerUnavailableError,
  NoUsablePlatformError,
} from '../common/errors';
import { sleep } from '../common/utils/sleep';
import { ContentSource } from '../content/content-source.service';
import { FetchReport } from '../content/interfaces';
import { LEDGER_STORE, LedgerOutcome } from '../ledger/interfaces';
import { RedundancyLedger } from '../ledger/redundancy-ledger.service';
import { InMemoryLedgerStore } from '../ledger/stores';
import { MediaGate } from '../media/media-gate.service';
import { FacebookPoster } from '../platforms/facebook/facebook.poster';
import { InstagramPoster } from '../platforms/instagram/instagram.poster';
import { TokenInspection } from '../tokens/interfaces';
import { TokenStore } from '../tokens/token-store.service';
import { SkipReason } from './interfaces';
import { PublishingOrchestrator } from './publishing-orchestrator.service';
import { RunReporter } from './run-reporter.service';

jest.mock('../common/utils/sleep');

const buildItem = (
  fingerprint: string,
  withMedia: boolean,
): ContentItem => ({
  id: `guid-${fingerprint}`,
  title: `Story ${fingerprint}`,
  link: `https://news.example.com/${fingerprint}`,
  author: 'Desk',
  sourceDomain: 'news.example.com',
  sourceName: 'Example News',
  publishedAt: '2026-10-01T08:00:00.000Z',
  bodyText: 'Body text.',
  mediaRefs: withMedia
    ? [{ url: `https://cdn.example.com/${fingerprint}.jpg`, kind: 'image' }]
    : [],
  fingerprint,
});

const credentialsFor = (platform: Platform): PlatformCredentials => ({
  platform,
  accessToken: 'test-token',
  accountId: `${platform}-account`,
  expiresAt: null,
  scopes: [],
});

const fbReference = (fingerprint: string) => ({
  id: `fb-${fingerprint}`,
  url: `https://www.facebook.com/fb-${fingerprint}`,
});

const igReference = (fingerprint: string) => ({
  id: `ig-${fingerprint}`,
  url: `https://www.instagram.com/p/ig-${fingerprint}`,
});

describe('PublishingOrchestrator', () => {
  const itemA = buildItem('fp-a', true);
  const itemB = buildItem('fp-b', false);

  let store: InMemoryLedgerStore;
  let feedItems: ContentItem[];
  let sourceFailures: FetchReport['sourceFailures'];
  let inspections: Map<Platform, TokenInspection>;
  let config: Record<string, string | undefined>;

  const facebookPoster = { platform: Platform.FACEBOOK, post: jest.fn() };
  const instagramPoster = { platform: Platform.INSTAGRAM, post: jest.fn() };
  const tokenStore = { preflight: jest.fn() };
  const reporter = { itemCompleted: jest.fn(), runCompleted: jest.fn() };
  const contentSource = {
    fetch: jest.fn(async function* (_maxItems: number, report: FetchReport) {
      report.sourceFailures.push(...sourceFailures);
      for (const item of feedItems) {
        report.fetched++;
        yield item;
      }
    }),
  };

  const createOrchestrator = async (): Promise<PublishingOrchestrator> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PublishingOrchestrator,
        RedundancyLedger,
        MediaGate,
        { provide: LEDGER_STORE, useValue: store },
        { provide: TokenStore, useValue: tokenStore },
        { provide: ContentSource, useValue: contentSource },
        { provide: FacebookPoster, useValue: facebookPoster },
        { provide: InstagramPoster, useValue: instagramPoster },
        { provide: RunReporter, useValue: reporter },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn(
              (key: string, fallback?: unknown) => config[key] ?? fallback,
            ),
          },
        },
      ],
    }).compile();

    return module.get<PublishingOrchestrator>(PublishingOrchestrator);
  };

  beforeEach(() => {
    store = new InMemoryLedgerStore();
    feedItems = [itemA, itemB];
    sourceFailures = [];
    config = {};
    inspections = new Map<Platform, TokenInspection>([
      [
        Platform.FACEBOOK,
        { status: 'valid', credentials: credentialsFor(Platform.FACEBOOK) },
      ],
      [
        Platform.INSTAGRAM,
        { status: 'valid', credentials: credentialsFor(Platform.INSTAGRAM) },
      ],
    ]);

    tokenStore.preflight.mockImplementation(async () => inspections);
    reporter.runCompleted.mockResolvedValue(undefined);
    facebookPoster.post.mockImplementation(
      async (item: ContentItem): Promise<PostResult> => ({
        platform: Platform.FACEBOOK,
        success: true,
        postReference: fbReference(item.fingerprint),
      }),
    );
    instagramPoster.post.mockImplementation(
      async (item: ContentItem): Promise<PostResult> => ({
        platform: Platform.INSTAGRAM,
        success: true,
        postReference: igReference(item.fingerprint),
      }),
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should post media items to both platforms and text items to Facebook only', async () => {
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({
      fetched: 2,
      filtered: 0,
      duplicates: 0,
      posted: { [Platform.FACEBOOK]: 2, [Platform.INSTAGRAM]: 1 },
      skipped: 1,
      failed: 0,
      unavailablePlatforms: [],
    });
    expect(summary.items.map((item) => item.outcomes)).toEqual([
      {
        [Platform.FACEBOOK]: {
          status: 'posted',
          postReference: fbReference('fp-a'),
          attempts: 1,
        },
        [Platform.INSTAGRAM]: {
          status: 'posted',
          postReference: igReference('fp-a'),
          attempts: 1,
        },
      },
      {
        [Platform.FACEBOOK]: {
          status: 'posted',
          postReference: fbReference('fp-b'),
          attempts: 1,
        },
        [Platform.INSTAGRAM]: { status: 'skipped', reason: SkipReason.NO_MEDIA },
      },
    ]);

    expect(instagramPoster.post).toHaveBeenCalledTimes(1);
    expect(instagramPoster.post).toHaveBeenCalledWith(
      itemA,
      credentialsFor(Platform.INSTAGRAM),
      fbReference('fp-a'),
    );
    expect(store.rows).toHaveLength(3);
    expect(reporter.itemCompleted).toHaveBeenCalledTimes(2);
    expect(reporter.runCompleted).toHaveBeenCalledWith(summary);
  });

  it('should attempt Instagram only after Facebook succeeded for the item', async () => {
    feedItems = [itemA];
    const orchestrator = await createOrchestrator();

    await orchestrator.run();

    const [facebookOrder] = facebookPoster.post.mock.invocationCallOrder;
    const [instagramOrder] = instagramPoster.post.mock.invocationCallOrder;
    expect(facebookOrder).toBeLessThan(instagramOrder);
    expect(store.rows.map((row) => row.platform)).toEqual([
      Platform.FACEBOOK,
      Platform.INSTAGRAM,
    ]);
  });

  it('should not post anything twice across runs', async () => {
    await (await createOrchestrator()).run();
    jest.clearAllMocks();

    const summary = await (await createOrchestrator()).run();

    expect(facebookPoster.post).not.toHaveBeenCalled();
    expect(instagramPoster.post).not.toHaveBeenCalled();
    expect(summary.filtered).toBe(1);
    expect(summary.items).toHaveLength(1);
    expect(summary.items[0].outcomes).toEqual({
      [Platform.FACEBOOK]: {
        status: 'skipped',
        reason: SkipReason.ALREADY_POSTED,
      },
      [Platform.INSTAGRAM]: { status: 'skipped', reason: SkipReason.NO_MEDIA },
    });
    expect(store.rows).toHaveLength(3);
  });

  it('should resume Instagram from a Facebook post recorded by an earlier run', async () => {
    const recorded = {
      id: 'page-1_story-7',
      url: 'https://www.facebook.com/page-1_story-7',
    };
    store = new InMemoryLedgerStore([
      {
        fingerprint: 'fp-a',
        platform: Platform.FACEBOOK,
        outcome: LedgerOutcome.POSTED,
        recordedAt: new Date('2026-10-01T09:00:00.000Z'),
        postReference: recorded,
        errorKind: null,
      },
    ]);
    feedItems = [itemA];
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(facebookPoster.post).not.toHaveBeenCalled();
    expect(instagramPoster.post).toHaveBeenCalledWith(
      itemA,
      credentialsFor(Platform.INSTAGRAM),
      recorded,
    );
    expect(summary.items[0].outcomes[Platform.FACEBOOK]).toEqual({
      status: 'skipped',
      reason: SkipReason.ALREADY_POSTED,
    });
    expect(summary.posted[Platform.INSTAGRAM]).toBe(1);
  });

  it('should skip Instagram when Facebook fails for the item', async () => {
    feedItems = [itemA];
    facebookPoster.post.mockResolvedValue({
      platform: Platform.FACEBOOK,
      success: false,
      errorKind: PostErrorKind.MEDIA_REJECTED,
      error: 'Invalid image',
    });
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(instagramPoster.post).not.toHaveBeenCalled();
    expect(facebookPoster.post).toHaveBeenCalledTimes(1);
    expect(summary.items[0].outcomes).toEqual({
      [Platform.FACEBOOK]: {
        status: 'failed',
        errorKind: PostErrorKind.MEDIA_REJECTED,
        error: 'Invalid image',
        attempts: 1,
      },
      [Platform.INSTAGRAM]: {
        status: 'skipped',
        reason: SkipReason.PARENT_NOT_POSTED,
      },
    });
    expect(summary.failed).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(store.rows).toEqual([
      expect.objectContaining({
        fingerprint: 'fp-a',
        platform: Platform.FACEBOOK,
        outcome: LedgerOutcome.FAILED,
        errorKind: PostErrorKind.MEDIA_REJECTED,
      }),
    ]);
  });

  it('should retry a transient failure with backoff', async () => {
    feedItems = [itemB];
    facebookPoster.post.mockResolvedValueOnce({
      platform: Platform.FACEBOOK,
      success: false,
      errorKind: PostErrorKind.TRANSIENT_NETWORK,
      error: 'Request timed out',
    });
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(facebookPoster.post).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(summary.items[0].outcomes[Platform.FACEBOOK]).toEqual({
      status: 'posted',
      postReference: fbReference('fp-b'),
      attempts: 2,
    });
    expect(store.rows).toHaveLength(1);
  });

  it('should give up after the configured attempts', async () => {
    feedItems = [itemB];
    config = { POST_MAX_ATTEMPTS: '3', POST_RETRY_DELAY_MS: '100' };
    facebookPoster.post.mockResolvedValue({
      platform: Platform.FACEBOOK,
      success: false,
      errorKind: PostErrorKind.RATE_LIMITED,
      error: 'Application request limit reached',
    });
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(facebookPoster.post).toHaveBeenCalledTimes(3);
    expect(jest.mocked(sleep).mock.calls).toEqual([[100], [200]]);
    expect(summary.items[0].outcomes[Platform.FACEBOOK]).toMatchObject({
      status: 'failed',
      errorKind: PostErrorKind.RATE_LIMITED,
      attempts: 3,
    });
    expect(store.rows).toHaveLength(1);
  });

  it('should fold an unexpected poster exception into a failed outcome', async () => {
    feedItems = [itemB];
    facebookPoster.post.mockRejectedValue(new Error('socket hang up'));
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(summary.items[0].outcomes[Platform.FACEBOOK]).toEqual({
      status: 'failed',
      errorKind: PostErrorKind.UNKNOWN,
      error: 'socket hang up',
      attempts: 1,
    });
  });

  it('should wait between items that made platform calls', async () => {
    const orchestrator = await createOrchestrator();

    await orchestrator.run();

    expect(jest.mocked(sleep).mock.calls).toEqual([[30000]]);
  });

  it('should skip Instagram with auth-invalid when its token is unusable', async () => {
    inspections.set(Platform.INSTAGRAM, {
      status: 'expired',
      reason: 'instagram token expired at 2026-01-01T00:00:00.000Z',
    });
    feedItems = [itemA];
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(instagramPoster.post).not.toHaveBeenCalled();
    expect(summary.unavailablePlatforms).toEqual([Platform.INSTAGRAM]);
    expect(summary.items[0].outcomes[Platform.INSTAGRAM]).toEqual({
      status: 'skipped',
      reason: SkipReason.AUTH_INVALID,
    });
    expect(summary.posted[Platform.FACEBOOK]).toBe(1);
  });

  it('should abort before fetching when no platform has a usable token', async () => {
    inspections = new Map<Platform, TokenInspection>([
      [Platform.FACEBOOK, { status: 'missing', reason: 'not found' }],
      [Platform.INSTAGRAM, { status: 'malformed', reason: 'bad JSON' }],
    ]);
    const orchestrator = await createOrchestrator();

    await expect(orchestrator.run()).rejects.toBeInstanceOf(
      NoUsablePlatformError,
    );
    expect(contentSource.fetch).not.toHaveBeenCalled();
    expect(store.rows).toHaveLength(0);
  });

  it('should abort when the ledger cannot be loaded', async () => {
    jest.spyOn(store, 'loadAll').mockRejectedValue(new Error('EACCES'));
    const orchestrator = await createOrchestrator();

    await expect(orchestrator.run()).rejects.toBeInstanceOf(
      LedgerUnavailableError,
    );
    expect(tokenStore.preflight).not.toHaveBeenCalled();
    expect(facebookPoster.post).not.toHaveBeenCalled();
  });

  it('should still publish items from healthy sources when one source fails', async () => {
    sourceFailures = [
      {
        source: 'https://down.example.com/rss',
        message: 'https://down.example.com/rss: HTTP 503',
      },
    ];
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(summary.sourceFailures).toEqual(sourceFailures);
    expect(summary.fetched).toBe(2);
    expect(summary.posted[Platform.FACEBOOK]).toBe(2);
  });

  it('should publish only to the configured targets', async () => {
    config = { TARGET_PLATFORMS: 'facebook' };
    const orchestrator = await createOrchestrator();

    const summary = await orchestrator.run();

    expect(tokenStore.preflight).toHaveBeenCalledWith([Platform.FACEBOOK]);
    expect(instagramPoster.post).not.toHaveBeenCalled();
    expect(summary.targets).toEqual([Platform.FACEBOOK]);
    expect(summary.items[0].outcomes[Platform.INSTAGRAM]).toBeUndefined();
    expect(summary.posted).toEqual({
      [Platform.FACEBOOK]: 2,
      [Platform.INSTAGRAM]: 0,
    });
  });
});
