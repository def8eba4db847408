import { LedgerRow, LedgerStore } from '../interfaces';

/**
 * Ledger store held in process memory
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly stored: LedgerRow[];

  constructor(rows: LedgerRow[] = []) {
    this.stored = [...rows];
  }

  get rows(): readonly LedgerRow[] {
    return this.stored;
  }

  async loadAll(): Promise<LedgerRow[]> {
    return this.stored.map((row) => ({ ...row }));
  }

  async append(row: LedgerRow): Promise<void> {
    this.stored.push({ ...row });
  }
}
