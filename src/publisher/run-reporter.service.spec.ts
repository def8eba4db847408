import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Platform, PostErrorKind } from '../common/interfaces';
import { ItemReport, RunSummary, SkipReason } from './interfaces';
import { describeOutcome, RunReporter } from './run-reporter.service';

describe('RunReporter', () => {
  let dir: string;
  let logSpy: jest.SpyInstance;

  const report: ItemReport = {
    fingerprint: 'fp-a',
    title: 'Harbour reopens',
    link: 'https://news.example.com/harbour',
    outcomes: {
      [Platform.FACEBOOK]: {
        status: 'posted',
        postReference: { id: 'fb-1', url: 'https://www.facebook.com/fb-1' },
        attempts: 1,
      },
      [Platform.INSTAGRAM]: { status: 'skipped', reason: SkipReason.NO_MEDIA },
    },
  };

  const summary: RunSummary = {
    startedAt: new Date('2026-10-01T08:00:00.000Z'),
    finishedAt: new Date('2026-10-01T08:01:00.000Z'),
    targets: [Platform.FACEBOOK, Platform.INSTAGRAM],
    unavailablePlatforms: [],
    fetched: 1,
    filtered: 0,
    duplicates: 0,
    posted: { [Platform.FACEBOOK]: 1, [Platform.INSTAGRAM]: 0 },
    skipped: 1,
    failed: 0,
    sourceFailures: [],
    items: [report],
  };

  const createReporter = (summaryPath?: string) =>
    new RunReporter({
      get: jest.fn((key: string) =>
        key === 'RUN_SUMMARY_PATH' ? summaryPath : undefined,
      ),
    } as unknown as ConfigService);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'summary-'));
    logSpy = jest
      .spyOn(Logger.prototype, 'log')
      .mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should describe every kind of outcome', () => {
    expect(
      describeOutcome({
        status: 'failed',
        errorKind: PostErrorKind.RATE_LIMITED,
        error: 'slow down',
        attempts: 2,
      }),
    ).toBe('failed rate-limited after 2 attempt(s)');
    expect(
      describeOutcome({ status: 'skipped', reason: SkipReason.AUTH_INVALID }),
    ).toBe('skipped auth-invalid');
  });

  it('should log one line per item', () => {
    createReporter().itemCompleted(report);

    expect(logSpy).toHaveBeenCalledWith(
      '"Harbour reopens" facebook=posted fb-1 instagram=skipped no-media',
    );
  });

  it('should write the summary as JSON when a path is configured', async () => {
    const summaryPath = join(dir, 'reports', 'summary.json');

    await createReporter(summaryPath).runCompleted(summary);

    const written = JSON.parse(await readFile(summaryPath, 'utf8'));
    expect(written).toMatchObject({
      startedAt: '2026-10-01T08:00:00.000Z',
      posted: { facebook: 1, instagram: 0 },
      skipped: 1,
      items: [{ fingerprint: 'fp-a' }],
    });
  });

  it('should only log when no path is configured', async () => {
    await createReporter().runCompleted(summary);

    expect(logSpy).toHaveBeenCalledWith(
      'Run finished: fetched=1 filtered=0 duplicates=0 posted[facebook=1 instagram=0] skipped=1 failed=0 sourceFailures=0',
    );
  });
});
