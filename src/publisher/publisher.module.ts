import { Module } from '@nestjs/common';
import { ContentModule } from '../content/content.module';
import { MediaModule } from '../media/media.module';
import { FacebookModule } from '../platforms/facebook/facebook.module';
import { InstagramModule } from '../platforms/instagram/instagram.module';
import { TokensModule } from '../tokens/tokens.module';
import { PublishingOrchestrator } from './publishing-orchestrator.service';
import { RunReporter } from './run-reporter.service';

/**
 * Publisher Module
 * Wires content, tokens and platform posters into one publishing pass.
 * The ledger comes from the global LedgerModule registered by AppModule.
 */
@Module({
  imports: [
    TokensModule,
    ContentModule,
    MediaModule,
    FacebookModule,
    InstagramModule,
  ],
  providers: [PublishingOrchestrator, RunReporter],
  exports: [PublishingOrchestrator],
})
export class PublisherModule {}
