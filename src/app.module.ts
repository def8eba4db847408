import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { LedgerModule } from './ledger/ledger.module';
import { PublisherModule } from './publisher/publisher.module';

@Module({
  imports: [
    // Global configuration, loaded before the ledger driver is chosen
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
    }),

    // Reads LEDGER_DRIVER, so it must follow ConfigModule
    LedgerModule.register(),

    PublisherModule,
  ],
})
export class AppModule {}
