import type { Platform, PlatformCredentials } from '../../common/interfaces';

export type TokenStatus = 'valid' | 'missing' | 'malformed' | 'expired';

export type TokenInspection =
  | { status: 'valid'; credentials: PlatformCredentials }
  | { status: Exclude<TokenStatus, 'valid'>; reason: string };

/**
 * Read access to platform credentials, with no write, refresh or
 * acquisition path.
 */
export interface ReadonlyTokenStore {
  status(platform: Platform): Promise<TokenStatus>;
  inspect(platform: Platform): Promise<TokenInspection>;
  preflight(
    platforms: readonly Platform[],
  ): Promise<ReadonlyMap<Platform, TokenInspection>>;
}
