import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PostErrorKind, PostReference } from '../../common/interfaces';
import { PlatformPostError } from '../../common/errors';
import {
  getGraphApiBaseUrl,
  getHttpTimeoutMs,
} from '../../config/publisher.config';
import {
  callGraphApi,
  GraphResponseBody,
  readString,
} from '../utils/graph-api';
import {
  DEFAULT_FACEBOOK_CONFIG,
  PublishFeedPostParams,
  PublishPhotoParams,
} from './interfaces';

/**
 * Facebook API Client
 * Handles Graph API calls for publishing to a Facebook Page
 */
@Injectable()
export class FacebookApiClient {
  private readonly logger = new Logger(FacebookApiClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly config = DEFAULT_FACEBOOK_CONFIG;

  constructor(configService: ConfigService) {
    this.baseUrl = getGraphApiBaseUrl(configService);
    this.timeoutMs = getHttpTimeoutMs(configService);
  }

  /**
   * Publish a photo post. Facebook downloads the image from the URL.
   */
  async publishPhoto(params: PublishPhotoParams): Promise<PostReference> {
    this.logger.log(`Publishing photo post to page: ${params.pageId}`);

    const data = await callGraphApi({
      method: 'POST',
      url: `${this.baseUrl}/${params.pageId}/photos`,
      accessToken: params.accessToken,
      params: {
        url: params.url,
        caption: params.caption,
      },
      timeoutMs: this.timeoutMs,
    });

    // post_id is the feed story; id alone is the photo object
    return this.toReference(
      data,
      readString(data, 'post_id') ?? readString(data, 'id'),
    );
  }

  /**
   * Publish a text post with an optional link preview
   */
  async publishFeedPost(params: PublishFeedPostParams): Promise<PostReference> {
    this.logger.log(`Publishing feed post to page: ${params.pageId}`);

    const data = await callGraphApi({
      method: 'POST',
      url: `${this.baseUrl}/${params.pageId}/feed`,
      accessToken: params.accessToken,
      params: {
        message: params.message,
        link: params.link,
      },
      timeoutMs: this.timeoutMs,
    });

    return this.toReference(data, readString(data, 'id'));
  }

  private toReference(
    data: GraphResponseBody,
    postId: string | undefined,
  ): PostReference {
    if (!postId) {
      throw new PlatformPostError(
        PostErrorKind.UNKNOWN,
        `Facebook response carried no post id: ${JSON.stringify(data)}`,
      );
    }

    this.logger.log(`Facebook post created: ${postId}`);
    return { id: postId, url: `${this.config.postUrlBase}/${postId}` };
  }
}
