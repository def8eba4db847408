import { Module } from '@nestjs/common';
import { MediaModule } from '../../media/media.module';
import { InstagramApiClient } from './instagram-api.client';
import { InstagramMediaService } from './instagram-media.service';
import { InstagramPoster } from './instagram.poster';

/**
 * Instagram Module
 * Provides Instagram publishing for the business account linked to the page
 *
 * Instagram API Notes:
 * - Uses Meta's Instagram Graph API for Business/Creator accounts
 * - Requires a Facebook Page linked to Instagram Business Account
 * - Posts are created via a 2-step container-based publishing flow
 */
@Module({
  imports: [MediaModule],
  providers: [InstagramApiClient, InstagramMediaService, InstagramPoster],
  exports: [InstagramPoster],
})
export class InstagramModule {}
