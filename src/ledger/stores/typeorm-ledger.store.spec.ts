import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Platform, PostErrorKind } from '../../common/interfaces';
import { LedgerRecord } from '../../database/entities';
import { LedgerOutcome } from '../interfaces';
import { TypeOrmLedgerStore } from './typeorm-ledger.store';

describe('TypeOrmLedgerStore', () => {
  let store: TypeOrmLedgerStore;

  const mockRepository = {
    find: jest.fn(),
    insert: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TypeOrmLedgerStore,
        {
          provide: getRepositoryToken(LedgerRecord),
          useValue: mockRepository,
        },
      ],
    }).compile();

    store = module.get<TypeOrmLedgerStore>(TypeOrmLedgerStore);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should load records oldest first as ledger rows', async () => {
    const recordedAt = new Date('2026-10-01T10:00:00.000Z');
    mockRepository.find.mockResolvedValue([
      {
        id: 'uuid-1',
        fingerprint: 'fp-1',
        platform: Platform.FACEBOOK,
        outcome: LedgerOutcome.POSTED,
        postId: 'page-1_story-1',
        postUrl: 'https://www.facebook.com/page-1_story-1',
        errorKind: null,
        recordedAt,
      },
      {
        id: 'uuid-2',
        fingerprint: 'fp-1',
        platform: Platform.INSTAGRAM,
        outcome: LedgerOutcome.FAILED,
        postId: null,
        postUrl: null,
        errorKind: PostErrorKind.RATE_LIMITED,
        recordedAt,
      },
    ]);

    const rows = await store.loadAll();

    expect(mockRepository.find).toHaveBeenCalledWith({
      order: { recordedAt: 'ASC' },
    });
    expect(rows).toEqual([
      {
        fingerprint: 'fp-1',
        platform: Platform.FACEBOOK,
        outcome: LedgerOutcome.POSTED,
        recordedAt,
        postReference: {
          id: 'page-1_story-1',
          url: 'https://www.facebook.com/page-1_story-1',
        },
        errorKind: null,
      },
      {
        fingerprint: 'fp-1',
        platform: Platform.INSTAGRAM,
        outcome: LedgerOutcome.FAILED,
        recordedAt,
        postReference: null,
        errorKind: PostErrorKind.RATE_LIMITED,
      },
    ]);
  });

  it('should insert one record per appended row', async () => {
    const recordedAt = new Date('2026-10-01T10:00:00.000Z');

    await store.append({
      fingerprint: 'fp-2',
      platform: Platform.INSTAGRAM,
      outcome: LedgerOutcome.POSTED,
      recordedAt,
      postReference: { id: 'media-1', url: 'https://www.instagram.com/p/Abc/' },
      errorKind: null,
    });

    expect(mockRepository.insert).toHaveBeenCalledWith({
      fingerprint: 'fp-2',
      platform: Platform.INSTAGRAM,
      outcome: LedgerOutcome.POSTED,
      recordedAt,
      postId: 'media-1',
      postUrl: 'https://www.instagram.com/p/Abc/',
      errorKind: null,
    });
  });
});
