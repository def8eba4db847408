import type { ContentItem } from './content.interface';

export enum Platform {
  FACEBOOK = 'facebook',
  INSTAGRAM = 'instagram',
}

/**
 * Platforms in dependency order: an Instagram post links back to the
 * Facebook post of the same item.
 */
export const ALL_PLATFORMS: readonly Platform[] = [
  Platform.FACEBOOK,
  Platform.INSTAGRAM,
];

export enum PostErrorKind {
  AUTH_INVALID = 'auth-invalid',
  MEDIA_REJECTED = 'media-rejected',
  RATE_LIMITED = 'rate-limited',
  TRANSIENT_NETWORK = 'transient-network',
  UNKNOWN = 'unknown-platform-error',
}

/**
 * Kinds worth another attempt within the same run
 */
export const RETRYABLE_ERROR_KINDS: ReadonlySet<PostErrorKind> = new Set([
  PostErrorKind.RATE_LIMITED,
  PostErrorKind.TRANSIENT_NETWORK,
]);

/**
 * Platform-assigned identity of a published post
 */
export interface PostReference {
  id: string;
  url: string;
}

export interface PostSuccess {
  platform: Platform;
  success: true;
  postReference: PostReference;
}

export interface PostFailure {
  platform: Platform;
  success: false;
  errorKind: PostErrorKind;
  error: string;
}

export type PostResult = PostSuccess | PostFailure;

/**
 * Read-only credentials for one platform account.
 * accountId is the page id for Facebook and the business account id for
 * Instagram.
 */
export interface PlatformCredentials {
  readonly platform: Platform;
  readonly accessToken: string;
  readonly accountId: string;
  readonly expiresAt: Date | null;
  readonly scopes: readonly string[];
}

/**
 * A platform that publishes an item on its own
 */
export interface PlatformPoster {
  readonly platform: Platform;

  post(
    item: ContentItem,
    credentials: PlatformCredentials,
  ): Promise<PostResult>;
}

/**
 * A platform whose post must link back to a post already published elsewhere
 */
export interface LinkedPlatformPoster {
  readonly platform: Platform;

  post(
    item: ContentItem,
    credentials: PlatformCredentials,
    parentReference: PostReference,
  ): Promise<PostResult>;
}
