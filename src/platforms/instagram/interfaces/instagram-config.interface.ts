/**
 * Instagram posting configuration
 */
export interface InstagramPostConfig {
  /**
   * Maximum caption length
   */
  maxCaptionLength: number;

  /**
   * Container status checks before giving up, images
   */
  imagePollAttempts: number;

  /**
   * Container status checks before giving up, videos
   */
  videoPollAttempts: number;

  /**
   * Delay between container status checks
   */
  pollDelayMs: number;

  /**
   * Fallback permalink base when the media lookup fails
   */
  permalinkBase: string;
}

/**
 * Default Instagram configuration values
 */
export const DEFAULT_INSTAGRAM_CONFIG: InstagramPostConfig = {
  maxCaptionLength: 2200,
  imagePollAttempts: 30,
  videoPollAttempts: 60,
  pollDelayMs: 2000,
  permalinkBase: 'https://www.instagram.com/p',
};
