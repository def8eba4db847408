import type {
  Platform,
  PostErrorKind,
  PostReference,
} from '../../common/interfaces';

export enum LedgerOutcome {
  POSTED = 'posted',
  FAILED = 'failed',
}

/**
 * One durable ledger row, whatever the backing store
 */
export interface LedgerRow {
  fingerprint: string;
  platform: Platform;
  outcome: LedgerOutcome;
  recordedAt: Date;
  postReference: PostReference | null;
  errorKind: PostErrorKind | null;
}

/**
 * Append-only tabular storage behind the ledger
 */
export interface LedgerStore {
  /**
   * Full scan, in insertion order
   */
  loadAll(): Promise<LedgerRow[]>;

  /**
   * Resolves once the row is durable
   */
  append(row: LedgerRow): Promise<void>;
}

export const LEDGER_STORE = Symbol('LEDGER_STORE');

/**
 * Everything the ledger knows about one fingerprint
 */
export interface LedgerEntry {
  fingerprint: string;
  processedAt: Date;
  /**
   * Platforms successfully posted to, with the reference each returned
   */
  platforms: ReadonlyMap<Platform, PostReference>;
  /**
   * Platforms with a recorded failure and no success yet
   */
  failures: ReadonlyMap<Platform, PostErrorKind>;
}
