import { plainToInstance, Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  validateSync,
} from 'class-validator';

export enum QuotaExhaustedPolicy {
  HALT = 'halt',
  BACKOFF = 'backoff',
}

/**
 * Only the variables without a usable default are required here.
 * Everything else is optional and falls back inside the config factories.
 */
export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  PORT?: number;

  @IsUrl({ require_tld: false })
  SUPABASE_URL!: string;

  @IsString()
  SUPABASE_ANON_KEY!: string;

  @IsOptional()
  @IsString()
  SUPABASE_SERVICE_ROLE_KEY?: string;

  @IsString()
  REDIS_URL!: string;

  @IsString()
  OPERATOR_API_KEY!: string;

  @IsUrl({ require_tld: false })
  MARKETPLACE_API_BASE_URL!: string;

  @IsOptional()
  @IsString()
  MARKETPLACE_ACCESS_TOKEN?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  REGISTRATION_BATCH_SIZE?: number;

  @IsOptional()
  @IsEnum(QuotaExhaustedPolicy)
  QUOTA_EXHAUSTED_POLICY?: QuotaExhaustedPolicy;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  MIN_MARGIN_RATE?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  MIN_CALL_INTERVAL_MS?: number;
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}
