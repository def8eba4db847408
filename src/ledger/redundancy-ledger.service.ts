import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ALL_PLATFORMS,
  Platform,
  PostErrorKind,
  PostReference,
  PostResult,
} from '../common/interfaces';
import { LedgerUnavailableError } from '../common/errors';
import { getErrorMessage } from '../common/utils/error.utils';
import {
  LEDGER_STORE,
  LedgerEntry,
  LedgerOutcome,
  LedgerRow,
  LedgerStore,
} from './interfaces';

interface MutableLedgerEntry extends LedgerEntry {
  platforms: Map<Platform, PostReference>;
  failures: Map<Platform, PostErrorKind>;
}

/**
 * Redundancy Ledger
 * Persistent record of which content fingerprints reached which platforms.
 * Loaded once per run, then appended to after every platform attempt.
 */
@Injectable()
export class RedundancyLedger {
  private readonly logger = new Logger(RedundancyLedger.name);
  private readonly entries = new Map<string, MutableLedgerEntry>();
  private loaded = false;

  constructor(@Inject(LEDGER_STORE) private readonly store: LedgerStore) {}

  /**
   * Full scan of the backing store. Fatal for the run when it fails.
   */
  async load(): Promise<void> {
    let rows: LedgerRow[];
    try {
      rows = await this.store.loadAll();
    } catch (error) {
      throw new LedgerUnavailableError(
        `Could not load the ledger: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    this.entries.clear();
    for (const row of rows) {
      this.apply(row);
    }
    this.loaded = true;

    this.logger.log(
      `Ledger loaded: ${rows.length} row(s), ${this.entries.size} fingerprint(s)`,
    );
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * True when every listed platform already has the fingerprint posted
   */
  alreadyProcessed(
    fingerprint: string,
    platforms: readonly Platform[] = ALL_PLATFORMS,
  ): boolean {
    const entry = this.entries.get(fingerprint);
    return (
      entry !== undefined &&
      platforms.every((platform) => entry.platforms.has(platform))
    );
  }

  isPosted(fingerprint: string, platform: Platform): boolean {
    return this.entries.get(fingerprint)?.platforms.has(platform) ?? false;
  }

  postReference(
    fingerprint: string,
    platform: Platform,
  ): PostReference | undefined {
    return this.entries.get(fingerprint)?.platforms.get(platform);
  }

  entry(fingerprint: string): LedgerEntry | undefined {
    return this.entries.get(fingerprint);
  }

  /**
   * Durably records a platform outcome. Idempotent: a posted pair is never
   * written twice and a failure is written at most once per pair, never
   * after a success.
   * @returns whether a row was written
   */
  async record(
    fingerprint: string,
    platform: Platform,
    outcome: PostResult,
  ): Promise<boolean> {
    if (!this.loaded) {
      throw new Error('Ledger must be loaded before recording outcomes');
    }

    const entry = this.entries.get(fingerprint);
    if (entry?.platforms.has(platform)) {
      this.logger.debug(
        `${platform} already recorded as posted for ${fingerprint.substring(0, 12)}`,
      );
      return false;
    }
    if (!outcome.success && entry?.failures.has(platform)) {
      return false;
    }

    const row: LedgerRow = outcome.success
      ? {
          fingerprint,
          platform,
          outcome: LedgerOutcome.POSTED,
          recordedAt: new Date(),
          postReference: { ...outcome.postReference },
          errorKind: null,
        }
      : {
          fingerprint,
          platform,
          outcome: LedgerOutcome.FAILED,
          recordedAt: new Date(),
          postReference: null,
          errorKind: outcome.errorKind,
        };

    try {
      await this.store.append(row);
    } catch (error) {
      throw new LedgerUnavailableError(
        `Could not write to the ledger: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    this.apply(row);
    return true;
  }

  private apply(row: LedgerRow): void {
    let entry = this.entries.get(row.fingerprint);
    if (!entry) {
      entry = {
        fingerprint: row.fingerprint,
        processedAt: row.recordedAt,
        platforms: new Map(),
        failures: new Map(),
      };
      this.entries.set(row.fingerprint, entry);
    }

    if (row.outcome === LedgerOutcome.POSTED && row.postReference) {
      entry.platforms.set(row.platform, row.postReference);
      entry.failures.delete(row.platform);
    } else if (
      row.outcome === LedgerOutcome.FAILED &&
      !entry.platforms.has(row.platform)
    ) {
      entry.failures.set(
        row.platform,
        row.errorKind ?? PostErrorKind.UNKNOWN,
      );
    }
  }
}
