import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { getDatabaseConfig } from '../config/database.config';
import type { LedgerDriver } from '../config/env.validation';
import { parseLedgerDriver } from '../config/publisher.config';
import { LedgerRecord } from '../database/entities';
import { LEDGER_STORE } from './interfaces';
import { RedundancyLedger } from './redundancy-ledger.service';
import { CsvLedgerStore, TypeOrmLedgerStore } from './stores';

/**
 * Ledger Module
 * Provides the RedundancyLedger over the store chosen by LEDGER_DRIVER:
 * - csv: flat file at LEDGER_PATH (default)
 * - postgres: ledger_records table through TypeORM
 * Registered once, globally, after ConfigModule has loaded .env.
 */
@Module({})
export class LedgerModule {
  static register(
    driver: LedgerDriver = parseLedgerDriver(process.env.LEDGER_DRIVER),
  ): DynamicModule {
    if (driver === 'postgres') {
      return {
        module: LedgerModule,
        global: true,
        imports: [
          TypeOrmModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) =>
              getDatabaseConfig(configService),
          }),
          TypeOrmModule.forFeature([LedgerRecord]),
        ],
        providers: [
          { provide: LEDGER_STORE, useClass: TypeOrmLedgerStore },
          RedundancyLedger,
        ],
        exports: [RedundancyLedger],
      };
    }

    return {
      module: LedgerModule,
      global: true,
      providers: [
        { provide: LEDGER_STORE, useClass: CsvLedgerStore },
        RedundancyLedger,
      ],
      exports: [RedundancyLedger],
    };
  }
}
