import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { LedgerRecord } from '../../database/entities';
import { LedgerRow, LedgerStore } from '../interfaces';

/**
 * Ledger rows in the ledger_records table (LEDGER_DRIVER=postgres)
 */
@Injectable()
export class TypeOrmLedgerStore implements LedgerStore {
  constructor(
    @InjectRepository(LedgerRecord)
    private readonly ledgerRepository: Repository<LedgerRecord>,
  ) {}

  async loadAll(): Promise<LedgerRow[]> {
    const records = await this.ledgerRepository.find({
      order: { recordedAt: 'ASC' },
    });

    return records.map((record) => ({
      fingerprint: record.fingerprint,
      platform: record.platform,
      outcome: record.outcome,
      recordedAt: record.recordedAt,
      postReference: record.postId
        ? { id: record.postId, url: record.postUrl ?? '' }
        : null,
      errorKind: record.errorKind,
    }));
  }

  async append(row: LedgerRow): Promise<void> {
    await this.ledgerRepository.insert({
      fingerprint: row.fingerprint,
      platform: row.platform,
      outcome: row.outcome,
      recordedAt: row.recordedAt,
      postId: row.postReference?.id ?? null,
      postUrl: row.postReference?.url ?? null,
      errorKind: row.errorKind,
    });
  }
}
