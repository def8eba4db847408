/**
 * Facebook Graph API Interfaces
 */

/**
 * Photo post parameters (POST /{page-id}/photos)
 */
export interface PublishPhotoParams {
  /**
   * Facebook Page ID
   */
  pageId: string;

  /**
   * Page access token
   */
  accessToken: string;

  /**
   * Publicly reachable image URL, fetched by Facebook
   */
  url: string;

  caption: string;
}

/**
 * Feed post parameters (POST /{page-id}/feed)
 */
export interface PublishFeedPostParams {
  pageId: string;
  accessToken: string;
  message: string;

  /**
   * Article link, rendered by Facebook as a preview card
   */
  link?: string;
}

export interface FacebookConfig {
  /**
   * Base for permalinks built from a post id
   */
  postUrlBase: string;
}

export const DEFAULT_FACEBOOK_CONFIG: FacebookConfig = {
  postUrlBase: 'https://www.facebook.com',
};
