import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
} from 'typeorm';
import { Platform, PostErrorKind } from '../../common/interfaces';
import { LedgerOutcome } from '../../ledger/interfaces';

/**
 * One publication attempt for a content fingerprint on one platform.
 * Rows are only ever inserted.
 */
@Entity('ledger_records')
@Index(['fingerprint', 'platform', 'outcome'], { unique: true })
export class LedgerRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 64 })
  @Index()
  fingerprint!: string;

  @Column({ type: 'varchar', length: 20 })
  platform!: Platform;

  @Column({ type: 'enum', enum: LedgerOutcome })
  outcome!: LedgerOutcome;

  @Column({ name: 'post_id', type: 'varchar', nullable: true })
  postId!: string | null;

  @Column({ name: 'post_url', type: 'varchar', nullable: true })
  postUrl!: string | null;

  @Column({ name: 'error_kind', type: 'varchar', length: 40, nullable: true })
  errorKind!: PostErrorKind | null;

  @Column({ name: 'recorded_at', type: 'timestamptz' })
  recordedAt!: Date;
}
