import {
  IsArray,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
} from 'class-validator';
import { Platform } from '../../common/interfaces';

/**
 * Shape of an oauth_tokens_<platform>.json record.
 * Files written by the OAuth setup tools use the page-token layout instead;
 * see toTokenRecordPlain.
 */
export class TokenRecordDto {
  @IsString()
  @IsNotEmpty()
  accessToken!: string;

  /**
   * Facebook page id, or Instagram business account id
   */
  @IsString()
  @IsNotEmpty()
  accountId!: string;

  /**
   * Omitted or null for tokens that never expire
   */
  @IsOptional()
  @IsISO8601()
  expiresAt?: string | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  scopes?: string[];
}

/**
 * Page-token layout written by the OAuth setup tools
 */
export interface PageTokenFile {
  user_access_token?: string;
  page_access_token?: string;
  page_id?: string;
  instagram_account_id?: string;
  platform?: string;
  timestamp?: number;
}

const ACCOUNT_ID_FIELDS: Record<Platform, keyof PageTokenFile> = {
  [Platform.FACEBOOK]: 'page_id',
  [Platform.INSTAGRAM]: 'instagram_account_id',
};

const idValue = (value: unknown): unknown =>
  typeof value === 'number' ? String(value) : value;

/**
 * Maps a parsed token file onto the TokenRecordDto fields. The page access
 * token becomes accessToken; page_id (Facebook) or instagram_account_id
 * (Instagram) becomes accountId. Fields already in record form win.
 */
export function toTokenRecordPlain(
  platform: Platform,
  plain: Record<string, unknown>,
): Record<string, unknown> {
  return {
    ...plain,
    accessToken: plain.accessToken ?? plain.page_access_token,
    accountId: idValue(plain.accountId ?? plain[ACCOUNT_ID_FIELDS[platform]]),
  };
}
