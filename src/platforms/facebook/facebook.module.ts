import { Module } from '@nestjs/common';
import { MediaModule } from '../../media/media.module';
import { FacebookApiClient } from './facebook-api.client';
import { FacebookPoster } from './facebook.poster';

/**
 * Facebook Module
 * Page publishing through the Graph API. Credentials come from the
 * token store at call time.
 */
@Module({
  imports: [MediaModule],
  providers: [FacebookApiClient, FacebookPoster],
  exports: [FacebookPoster],
})
export class FacebookModule {}
