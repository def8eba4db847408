import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { Platform } from '../common/interfaces';
import { getErrorMessage, hasErrorCode } from '../common/utils/error.utils';
import { getTokensDir } from '../config/publisher.config';
import { TokenRecordDto, toTokenRecordPlain } from './dto/token-record.dto';
import { ReadonlyTokenStore, TokenInspection, TokenStatus } from './interfaces';

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Token Store
 * Reads per-platform OAuth token files written by the separate OAuth setup.
 * Tokens are inputs only: an unusable token makes its platform unavailable
 * for the run and is never refreshed from here.
 */
@Injectable()
export class TokenStore implements ReadonlyTokenStore {
  private readonly logger = new Logger(TokenStore.name);
  private readonly tokensDir: string;

  constructor(configService: ConfigService) {
    this.tokensDir = resolve(getTokensDir(configService));
  }

  tokenFile(platform: Platform): string {
    return join(this.tokensDir, `oauth_tokens_${platform}.json`);
  }

  async status(platform: Platform): Promise<TokenStatus> {
    return (await this.inspect(platform)).status;
  }

  async inspect(
    platform: Platform,
    now: Date = new Date(),
  ): Promise<TokenInspection> {
    const file = this.tokenFile(platform);

    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return { status: 'missing', reason: `${file} not found` };
      }
      return {
        status: 'malformed',
        reason: `${file} unreadable: ${getErrorMessage(error)}`,
      };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return {
        status: 'malformed',
        reason: `${file} is not valid JSON: ${getErrorMessage(error)}`,
      };
    }

    if (!isJsonObject(parsed)) {
      return { status: 'malformed', reason: `${file} is not a JSON object` };
    }

    const record = plainToInstance(
      TokenRecordDto,
      toTokenRecordPlain(platform, parsed),
    );
    const errors = validateSync(record);
    if (errors.length > 0) {
      const problems = errors.flatMap((error) =>
        Object.values(error.constraints ?? {}),
      );
      return {
        status: 'malformed',
        reason: `${file}: ${problems.join(', ')}`,
      };
    }

    const expiresAt = record.expiresAt ? new Date(record.expiresAt) : null;
    if (expiresAt && expiresAt.getTime() <= now.getTime()) {
      return {
        status: 'expired',
        reason: `${platform} token expired at ${expiresAt.toISOString()}`,
      };
    }

    return {
      status: 'valid',
      credentials: Object.freeze({
        platform,
        accessToken: record.accessToken,
        accountId: record.accountId,
        expiresAt,
        scopes: Object.freeze([...(record.scopes ?? [])]),
      }),
    };
  }

  /**
   * Inspects every platform and logs the ones that are unavailable
   */
  async preflight(
    platforms: readonly Platform[],
  ): Promise<Map<Platform, TokenInspection>> {
    const inspections = new Map<Platform, TokenInspection>();

    for (const platform of platforms) {
      const inspection = await this.inspect(platform);
      inspections.set(platform, inspection);

      if (inspection.status === 'valid') {
        this.logger.log(
          `${platform} token valid for account ${inspection.credentials.accountId}`,
        );
      } else {
        this.logger.warn(
          `${platform} unavailable for this run (${inspection.status}): ${inspection.reason}`,
        );
      }
    }

    return inspections;
  }
}
