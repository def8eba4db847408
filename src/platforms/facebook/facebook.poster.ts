import { Injectable, Logger } from '@nestjs/common';
import {
  ContentItem,
  Platform,
  PlatformCredentials,
  PlatformPoster,
  PostResult,
} from '../../common/interfaces';
import { MediaGate } from '../../media/media-gate.service';
import { failedPost } from '../utils/graph-api';
import { FacebookApiClient } from './facebook-api.client';

/**
 * Facebook Poster
 * Publishes an item to the page: a photo post when the item carries an
 * image, a link post otherwise.
 */
@Injectable()
export class FacebookPoster implements PlatformPoster {
  readonly platform = Platform.FACEBOOK;
  private readonly logger = new Logger(FacebookPoster.name);

  constructor(
    private readonly apiClient: FacebookApiClient,
    private readonly mediaGate: MediaGate,
  ) {}

  /**
   * Title, body and article link separated by blank lines
   */
  buildMessage(item: ContentItem): string {
    return [item.title, item.bodyText, item.link]
      .filter((part) => part.length > 0)
      .join('\n\n');
  }

  async post(
    item: ContentItem,
    credentials: PlatformCredentials,
  ): Promise<PostResult> {
    const image = this.mediaGate
      .qualifyingMedia(item)
      .find((ref) => ref.kind === 'image');
    const message = this.buildMessage(item);

    try {
      const postReference = image
        ? await this.apiClient.publishPhoto({
            pageId: credentials.accountId,
            accessToken: credentials.accessToken,
            url: image.url,
            caption: message,
          })
        : await this.apiClient.publishFeedPost({
            pageId: credentials.accountId,
            accessToken: credentials.accessToken,
            message,
            link: item.link || undefined,
          });

      return { platform: this.platform, success: true, postReference };
    } catch (error) {
      const result = failedPost(this.platform, error);
      this.logger.warn(
        `Facebook post failed for "${item.title}" (${result.errorKind}): ${result.error}`,
      );
      return result;
    }
  }
}
