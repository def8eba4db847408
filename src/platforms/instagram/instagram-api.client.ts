import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  MediaRef,
  PostErrorKind,
  PostReference,
} from '../../common/interfaces';
import { PlatformPostError } from '../../common/errors';
import { getErrorMessage } from '../../common/utils/error.utils';
import { sleep } from '../../common/utils/sleep';
import {
  getGraphApiBaseUrl,
  getHttpTimeoutMs,
} from '../../config/publisher.config';
import { callGraphApi, readString } from '../utils/graph-api';
import {
  CreateMediaContainerParams,
  DEFAULT_INSTAGRAM_CONFIG,
  MEDIA_CONTAINER_STATUSES,
  MediaContainerStatus,
  PublishMediaParams,
} from './interfaces';

/**
 * Instagram API Client
 * Handles all Graph API calls for Instagram content publishing
 */
@Injectable()
export class InstagramApiClient {
  private readonly logger = new Logger(InstagramApiClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly config = DEFAULT_INSTAGRAM_CONFIG;

  constructor(configService: ConfigService) {
    this.baseUrl = getGraphApiBaseUrl(configService);
    this.timeoutMs = getHttpTimeoutMs(configService);
  }

  /**
   * Create a media container for a single image or video
   */
  async createMediaContainer(
    params: CreateMediaContainerParams,
  ): Promise<string> {
    this.logger.log(`Creating media container for IG user: ${params.igUserId}`);

    const data = await callGraphApi({
      method: 'POST',
      url: `${this.baseUrl}/${params.igUserId}/media`,
      accessToken: params.accessToken,
      params: {
        image_url: params.imageUrl,
        video_url: params.videoUrl,
        media_type: params.videoUrl ? 'REELS' : undefined,
        caption: params.caption,
      },
      timeoutMs: this.timeoutMs,
    });

    const containerId = readString(data, 'id');
    if (!containerId) {
      throw new PlatformPostError(
        PostErrorKind.UNKNOWN,
        'Media container response carried no id',
      );
    }

    this.logger.log(`Media container created: ${containerId}`);
    return containerId;
  }

  /**
   * Check the status of a media container
   */
  async getContainerStatus(
    containerId: string,
    accessToken: string,
  ): Promise<MediaContainerStatus> {
    const data = await callGraphApi({
      method: 'GET',
      url: `${this.baseUrl}/${containerId}`,
      accessToken,
      params: { fields: 'status_code' },
      timeoutMs: this.timeoutMs,
    });

    const statusCode = readString(data, 'status_code');
    const status = MEDIA_CONTAINER_STATUSES.find(
      (candidate) => candidate === statusCode,
    );
    if (!status) {
      throw new PlatformPostError(
        PostErrorKind.UNKNOWN,
        `Unexpected container status: ${statusCode ?? 'none'}`,
      );
    }
    return status;
  }

  /**
   * Wait for media container to be ready
   */
  async waitForContainerReady(
    containerId: string,
    accessToken: string,
    maxAttempts: number = this.config.imagePollAttempts,
    delayMs: number = this.config.pollDelayMs,
  ): Promise<void> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const status = await this.getContainerStatus(containerId, accessToken);

      this.logger.debug(`Container ${containerId} status (attempt ${attempt}): ${status}`);

      if (status === 'FINISHED' || status === 'PUBLISHED') {
        return;
      }

      if (status === 'ERROR' || status === 'EXPIRED') {
        throw new PlatformPostError(
          PostErrorKind.MEDIA_REJECTED,
          `Media container failed with status: ${status}`,
        );
      }

      // IN_PROGRESS
      if (attempt < maxAttempts) {
        await sleep(delayMs);
      }
    }

    throw new PlatformPostError(
      PostErrorKind.TRANSIENT_NETWORK,
      `Media container did not become ready after ${maxAttempts} attempts`,
    );
  }

  /**
   * Publish a media container
   */
  async publishMedia(params: PublishMediaParams): Promise<string> {
    this.logger.log(`Publishing media container: ${params.creationId}`);

    const data = await callGraphApi({
      method: 'POST',
      url: `${this.baseUrl}/${params.igUserId}/media_publish`,
      accessToken: params.accessToken,
      params: { creation_id: params.creationId },
      timeoutMs: this.timeoutMs,
    });

    const mediaId = readString(data, 'id');
    if (!mediaId) {
      throw new PlatformPostError(
        PostErrorKind.UNKNOWN,
        'Media publish response carried no id',
      );
    }

    this.logger.log(`Media published successfully: ${mediaId}`);
    return mediaId;
  }

  /**
   * Permalink of published media. The media is already live at this point,
   * so a failed lookup falls back to a URL built from the id.
   */
  async getPermalink(mediaId: string, accessToken: string): Promise<string> {
    const fallback = `${this.config.permalinkBase}/${mediaId}`;
    try {
      const data = await callGraphApi({
        method: 'GET',
        url: `${this.baseUrl}/${mediaId}`,
        accessToken,
        params: { fields: 'id,permalink' },
        timeoutMs: this.timeoutMs,
      });
      return readString(data, 'permalink') ?? fallback;
    } catch (error) {
      this.logger.warn(
        `Permalink lookup failed for ${mediaId}: ${getErrorMessage(error)}`,
      );
      return fallback;
    }
  }

  /**
   * Create and publish a post (full flow)
   */
  async createPost(
    igUserId: string,
    accessToken: string,
    media: MediaRef,
    caption: string,
  ): Promise<PostReference> {
    const isVideo = media.kind === 'video';

    // Step 1: Create media container
    const containerId = await this.createMediaContainer({
      igUserId,
      accessToken,
      imageUrl: isVideo ? undefined : media.url,
      videoUrl: isVideo ? media.url : undefined,
      caption,
    });

    // Step 2: Wait for container to be ready (videos take longer to process)
    await this.waitForContainerReady(
      containerId,
      accessToken,
      isVideo ? this.config.videoPollAttempts : this.config.imagePollAttempts,
    );

    // Step 3: Publish the container
    const mediaId = await this.publishMedia({
      igUserId,
      accessToken,
      creationId: containerId,
    });

    // Step 4: Get the permalink
    return { id: mediaId, url: await this.getPermalink(mediaId, accessToken) };
  }
}
