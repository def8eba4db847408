import type {
  Platform,
  PostErrorKind,
  PostReference,
} from '../../common/interfaces';
import type { SourceFailure } from '../../content/interfaces';

/**
 * Why a platform was not attempted for an item
 */
export enum SkipReason {
  ALREADY_POSTED = 'already-posted',
  NO_MEDIA = 'no-media',
  AUTH_INVALID = 'auth-invalid',
  PARENT_NOT_POSTED = 'parent-not-posted',
}

export interface PostedOutcome {
  status: 'posted';
  postReference: PostReference;
  attempts: number;
}

export interface FailedOutcome {
  status: 'failed';
  errorKind: PostErrorKind;
  error: string;
  attempts: number;
}

export interface SkippedOutcome {
  status: 'skipped';
  reason: SkipReason;
}

export type PlatformOutcome = PostedOutcome | FailedOutcome | SkippedOutcome;

export interface ItemReport {
  fingerprint: string;
  title: string;
  link: string;
  /**
   * One entry per target platform
   */
  outcomes: Partial<Record<Platform, PlatformOutcome>>;
}

export interface RunSummary {
  startedAt: Date;
  finishedAt: Date;
  targets: Platform[];
  /**
   * Targets left out of the run because their token is unusable
   */
  unavailablePlatforms: Platform[];
  fetched: number;
  /**
   * Items dropped because every target already had them
   */
  filtered: number;
  duplicates: number;
  posted: Record<Platform, number>;
  skipped: number;
  failed: number;
  sourceFailures: SourceFailure[];
  items: ItemReport[];
}
