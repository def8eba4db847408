import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, open, readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { Platform, PostErrorKind } from '../../common/interfaces';
import { hasErrorCode } from '../../common/utils/error.utils';
import { getLedgerPath } from '../../config/publisher.config';
import { LedgerOutcome, LedgerRow, LedgerStore } from '../interfaces';
import { formatCsvLine, parseCsvLine } from './csv';

export const LEDGER_COLUMNS = [
  'recorded_at',
  'fingerprint',
  'platform',
  'outcome',
  'post_id',
  'post_url',
  'error_kind',
] as const;

const oneOf = <T extends string>(
  values: readonly T[],
  value: string,
): T | undefined => values.find((candidate) => candidate === value);

/**
 * Flat-file ledger: one CSV row per publication attempt.
 * Every append is synced to disk before it resolves.
 */
@Injectable()
export class CsvLedgerStore implements LedgerStore {
  private readonly logger = new Logger(CsvLedgerStore.name);
  readonly filePath: string;

  constructor(configService: ConfigService) {
    this.filePath = resolve(getLedgerPath(configService));
  }

  async loadAll(): Promise<LedgerRow[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.log(`No ledger at ${this.filePath} yet, starting empty`);
        return [];
      }
      throw error;
    }

    const lines = raw.split(/\r?\n/);
    // A crash mid-append can leave a partial last line without its newline
    const partial = raw.length > 0 && !raw.endsWith('\n') ? lines.pop() : '';
    if (partial) {
      this.logger.warn(
        `Ignoring incomplete last ledger line in ${this.filePath}`,
      );
    }

    const rows = lines.filter((line) => line.trim().length > 0);
    if (rows.length === 0) {
      return [];
    }

    const header = parseCsvLine(rows[0]);
    if (header.join(',') !== LEDGER_COLUMNS.join(',')) {
      throw new Error(
        `Unexpected ledger header in ${this.filePath}: ${rows[0]}`,
      );
    }

    return rows.slice(1).map((line, index) => this.parseRow(line, index + 2));
  }

  async append(row: LedgerRow): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const handle = await open(this.filePath, 'a+');

    try {
      const { size } = await handle.stat();
      let length = size;

      if (size > 0) {
        const last = Buffer.alloc(1);
        await handle.read(last, 0, 1, size - 1);
        if (last[0] !== 0x0a) {
          // Drop the incomplete line left by an interrupted append
          const content = await handle.readFile();
          length = content.lastIndexOf(0x0a) + 1;
          await handle.truncate(length);
          this.logger.warn(
            `Discarded incomplete last ledger line in ${this.filePath}`,
          );
        }
      }

      let text = length === 0 ? formatCsvLine(LEDGER_COLUMNS) : '';
      text += formatCsvLine([
        row.recordedAt.toISOString(),
        row.fingerprint,
        row.platform,
        row.outcome,
        row.postReference?.id ?? '',
        row.postReference?.url ?? '',
        row.errorKind ?? '',
      ]);

      await handle.appendFile(text, 'utf8');
      await handle.datasync();
    } finally {
      await handle.close();
    }
  }

  private parseRow(line: string, lineNumber: number): LedgerRow {
    const fields = parseCsvLine(line);
    const fail = (reason: string): never => {
      throw new Error(`Ledger line ${lineNumber} in ${this.filePath}: ${reason}`);
    };

    if (fields.length !== LEDGER_COLUMNS.length) {
      fail(`expected ${LEDGER_COLUMNS.length} fields, got ${fields.length}`);
    }

    const [
      recordedAt,
      fingerprint,
      platform,
      outcome,
      postId,
      postUrl,
      errorKind,
    ] = fields;

    const recordedDate = new Date(recordedAt);
    if (Number.isNaN(recordedDate.getTime())) {
      fail(`invalid timestamp '${recordedAt}'`);
    }

    if (!fingerprint) {
      fail('empty fingerprint');
    }

    const parsedPlatform =
      oneOf(Object.values(Platform), platform) ??
      fail(`unknown platform '${platform}'`);
    const parsedOutcome =
      oneOf(Object.values(LedgerOutcome), outcome) ??
      fail(`unknown outcome '${outcome}'`);
    const parsedErrorKind = errorKind
      ? (oneOf(Object.values(PostErrorKind), errorKind) ??
        fail(`unknown error kind '${errorKind}'`))
      : null;

    if (parsedOutcome === LedgerOutcome.POSTED && !postId) {
      fail('posted row without post id');
    }

    return {
      fingerprint,
      platform: parsedPlatform,
      outcome: parsedOutcome,
      recordedAt: recordedDate,
      postReference: postId ? { id: postId, url: postUrl } : null,
      errorKind: parsedErrorKind,
    };
  }
}
