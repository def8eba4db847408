/**
 * Instagram Graph API Interfaces
 */

/**
 * Media container status
 */
export type MediaContainerStatus =
  | 'EXPIRED'
  | 'ERROR'
  | 'FINISHED'
  | 'IN_PROGRESS'
  | 'PUBLISHED';

export const MEDIA_CONTAINER_STATUSES: readonly MediaContainerStatus[] = [
  'EXPIRED',
  'ERROR',
  'FINISHED',
  'IN_PROGRESS',
  'PUBLISHED',
];

/**
 * Create media container parameters
 */
export interface CreateMediaContainerParams {
  /**
   * Instagram Business Account ID
   */
  igUserId: string;

  /**
   * Access token for API calls
   */
  accessToken: string;

  /**
   * Image URL (required for image posts)
   */
  imageUrl?: string;

  /**
   * Video URL, published as a Reel
   */
  videoUrl?: string;

  caption: string;
}

/**
 * Publish media parameters
 */
export interface PublishMediaParams {
  igUserId: string;
  accessToken: string;

  /**
   * Media container ID to publish
   */
  creationId: string;
}
