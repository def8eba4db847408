import { Platform, PostErrorKind } from '../interfaces';

export class PublisherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or unusable setup: credentials, ledger store, environment
 */
export class ConfigurationError extends PublisherError {}

export class LedgerUnavailableError extends ConfigurationError {}

export class NoUsablePlatformError extends ConfigurationError {
  constructor(readonly platforms: readonly Platform[]) {
    super(
      `No usable credentials for any target platform (${platforms.join(', ')})`,
    );
  }
}

/**
 * One feed source could not be fetched or parsed
 */
export class SourceFetchError extends PublisherError {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${message}`, options);
  }
}

export interface PlatformPostErrorDetails {
  status?: number;
  code?: number;
  subcode?: number;
  cause?: unknown;
}

/**
 * A failed call to a platform API, classified by kind
 */
export class PlatformPostError extends PublisherError {
  readonly status?: number;
  readonly code?: number;
  readonly subcode?: number;

  constructor(
    readonly kind: PostErrorKind,
    message: string,
    details: PlatformPostErrorDetails = {},
  ) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.code = details.code;
    this.subcode = details.subcode;
  }
}
