import { ConfigService } from '@nestjs/config';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { LedgerRecord } from '../database/entities';

/**
 * Postgres connection for the ledger when LEDGER_DRIVER=postgres
 */
export const getDatabaseConfig = (
  configService: ConfigService,
): TypeOrmModuleOptions => ({
  type: 'postgres',
  url: configService.get<string>('DATABASE_URL'),
  entities: [LedgerRecord],
  synchronize: String(configService.get('DB_SYNCHRONIZE', 'false')) === 'true',
  retryAttempts: 2,
  retryDelay: 1000,
});
