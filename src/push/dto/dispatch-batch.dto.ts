import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
  validate,
  ValidationError,
} from 'class-validator';
import { MAX_TTL_SECONDS } from '../push.constants';
import { DispatchRequest, PushPriority } from '../push.contracts';
import { PushError } from '../push.errors';

export const pushPriorities = ['normal', 'high'] as const;

class NotificationPayloadDto {
  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsString()
  body?: string;

  @IsOptional()
  @IsObject()
  data?: Record<string, string>;
}

class DispatchRequestDto {
  @IsString()
  token!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => NotificationPayloadDto)
  payload!: NotificationPayloadDto;

  @IsOptional()
  @IsIn(pushPriorities)
  priority?: PushPriority;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_TTL_SECONDS)
  ttlSeconds?: number;
}

/**
 * Batch file accepted by the CLI:
 * `{ "timeoutMs"?: number, "messages": [{ "token", "payload", ... }] }`
 */
export class DispatchBatchDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  timeoutMs?: number;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => DispatchRequestDto)
  messages!: DispatchRequestDto[];
}

/**
 * Validates untrusted JSON into a batch. Failures become INVALID_BATCH.
 */
export async function parseDispatchBatch(raw: unknown): Promise<DispatchBatchDto> {
  const dto = plainToInstance(DispatchBatchDto, raw);
  if (typeof dto !== 'object' || dto === null || Array.isArray(dto)) {
    throw new PushError('INVALID_BATCH', 'Batch file must contain a JSON object');
  }

  const errors = await validate(dto, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new PushError('INVALID_BATCH', `Invalid batch: ${flattenErrors(errors).join('; ')}`);
  }
  return dto;
}

export function toDispatchRequests(dto: DispatchBatchDto): DispatchRequest[] {
  return dto.messages.map((m) => ({
    token: m.token,
    payload: { title: m.payload.title, body: m.payload.body, data: m.payload.data },
    priority: m.priority,
    ttlSeconds: m.ttlSeconds,
  }));
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((e) => {
    const path = prefix ? `${prefix}.${e.property}` : e.property;
    const own = Object.values(e.constraints ?? {}).map((msg) => `${path}: ${msg}`);
    return [...own, ...flattenErrors(e.children ?? [], path)];
  });
}
