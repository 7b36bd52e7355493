import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Environment schema. Everything is optional here; the components that
 * need a value (gateway URL, static token) fail when they are built.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsUrl({ require_tld: false, protocols: ['http', 'https'] })
  PUSH_GATEWAY_URL?: string;

  @IsOptional()
  @IsString()
  PUSH_GATEWAY_TOKEN?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  PUSH_GATEWAY_TIMEOUT_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  PUSH_MAX_TOKEN_BYTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  PUSH_MAX_PAYLOAD_BYTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  PUSH_MAX_BATCH_SIZE?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  PUSH_CONCURRENCY?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(10)
  PUSH_MAX_RETRIES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  PUSH_RETRY_BASE_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  PUSH_RETRY_FACTOR?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  PUSH_RETRY_MAX_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  PUSH_MAX_RETRY_AFTER_MS?: number;
}

export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((e) => Object.values(e.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return validated;
}
