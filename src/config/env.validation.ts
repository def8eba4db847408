import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors';

export const LEDGER_DRIVERS = ['csv', 'postgres'] as const;
export type LedgerDriver = (typeof LEDGER_DRIVERS)[number];

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Environment accepted by the publisher. Everything has a default,
 * so a bare environment is valid.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  FEED_URLS?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  MAX_ITEMS_PER_FEED?: number;

  /**
   * Comma-separated VisualPing url ids, checked after the RSS feeds
   */
  @IsOptional()
  @IsString()
  VISUALPING_URL_IDS?: string;

  @IsOptional()
  @IsString()
  VISUALPING_API_KEY?: string;

  @IsOptional()
  @Matches(/^\s*(facebook|instagram)(\s*,\s*(facebook|instagram))*\s*$/i, {
    message: 'TARGET_PLATFORMS must list facebook and/or instagram',
  })
  TARGET_PLATFORMS?: string;

  @IsOptional()
  @IsString()
  TOKENS_DIR?: string;

  @IsOptional()
  @IsIn(LEDGER_DRIVERS)
  LEDGER_DRIVER?: LedgerDriver;

  @IsOptional()
  @IsString()
  LEDGER_PATH?: string;

  @ValidateIf((env: EnvironmentVariables) => env.LEDGER_DRIVER === 'postgres')
  @IsString()
  @IsNotEmpty()
  DATABASE_URL?: string;

  @IsOptional()
  @IsBooleanString()
  DB_SYNCHRONIZE?: string;

  @IsOptional()
  @Matches(/^v\d+\.\d+$/)
  GRAPH_API_VERSION?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  POST_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  POST_RETRY_DELAY_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  ITEM_DELAY_MS?: number;

  @IsOptional()
  @IsString()
  RUN_SUMMARY_PATH?: string;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: LogLevelName;
}

/**
 * ConfigModule validate hook: converts numeric strings and rejects bad values
 */
export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new ConfigurationError(
      `Invalid environment: ${messages.join('; ')}`,
    );
  }

  return validated;
}
