import { Injectable, Logger } from '@nestjs/common';
import {
  ContentItem,
  LinkedPlatformPoster,
  Platform,
  PlatformCredentials,
  PostErrorKind,
  PostReference,
  PostResult,
} from '../../common/interfaces';
import { failedPost } from '../utils/graph-api';
import { InstagramApiClient } from './instagram-api.client';
import { InstagramMediaService } from './instagram-media.service';

/**
 * Instagram Poster
 * Publishes an item's primary media to the business account, captioned
 * with a link back to the item's Facebook post.
 */
@Injectable()
export class InstagramPoster implements LinkedPlatformPoster {
  readonly platform = Platform.INSTAGRAM;
  private readonly logger = new Logger(InstagramPoster.name);

  constructor(
    private readonly apiClient: InstagramApiClient,
    private readonly mediaService: InstagramMediaService,
  ) {}

  async post(
    item: ContentItem,
    credentials: PlatformCredentials,
    parentReference: PostReference,
  ): Promise<PostResult> {
    const media = this.mediaService.primaryMedia(item);
    if (!media) {
      return {
        platform: this.platform,
        success: false,
        errorKind: PostErrorKind.MEDIA_REJECTED,
        error: 'Item has no image or video for Instagram',
      };
    }

    try {
      const postReference = await this.apiClient.createPost(
        credentials.accountId,
        credentials.accessToken,
        media,
        this.mediaService.buildCaption(item, parentReference),
      );
      return { platform: this.platform, success: true, postReference };
    } catch (error) {
      const result = failedPost(this.platform, error);
      this.logger.warn(
        `Instagram post failed for "${item.title}" (${result.errorKind}): ${result.error}`,
      );
      return result;
    }
  }
}
