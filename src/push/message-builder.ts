import { Inject, Injectable } from '@nestjs/common';
import { PushConfig } from '../config/push.config';
import {
  MAX_TTL_SECONDS,
  PUSH_CONFIG,
  RESERVED_DATA_KEY_PREFIXES,
  RESERVED_DATA_KEYS,
} from './push.constants';
import {
  Envelope,
  NotificationPayload,
  PushPriority,
  ValidToken,
} from './push.contracts';
import { InvalidPayloadDetail, PushError } from './push.errors';

export interface EnvelopeOptions {
  priority?: PushPriority;
  ttlSeconds?: number;
}

/**
 * Builds immutable, serialized envelopes in the FCM HTTP v1 request shape.
 *
 * Identical input always serializes to the same bytes: data keys are
 * sorted and every object is assembled in a fixed key order.
 */
@Injectable()
export class MessageBuilder {
  constructor(@Inject(PUSH_CONFIG) private readonly config: PushConfig) {}

  build(
    token: ValidToken,
    payload: NotificationPayload,
    options: EnvelopeOptions = {},
  ): Envelope {
    const title = nonBlank(payload.title);
    const body = nonBlank(payload.body);
    const data = this.normalizeData(payload.data);

    if (title === undefined && body === undefined && data === undefined) {
      throw invalidPayload('empty_payload', 'Notification needs a title, body or data');
    }

    const priority: PushPriority = options.priority ?? 'normal';
    const ttlSeconds = options.ttlSeconds;
    if (
      ttlSeconds !== undefined &&
      (!Number.isInteger(ttlSeconds) || ttlSeconds < 0 || ttlSeconds > MAX_TTL_SECONDS)
    ) {
      throw invalidPayload('invalid_ttl', `ttlSeconds must be an integer between 0 and ${MAX_TTL_SECONDS}`);
    }

    const notification =
      title !== undefined || body !== undefined
        ? { ...(title !== undefined && { title }), ...(body !== undefined && { body }) }
        : undefined;

    const contentBytes = Buffer.byteLength(JSON.stringify({ notification, data }), 'utf8');
    if (contentBytes > this.config.maxPayloadBytes) {
      throw invalidPayload(
        'payload_too_large',
        `Payload is ${contentBytes} bytes, limit is ${this.config.maxPayloadBytes}`,
      );
    }

    const serialized = JSON.stringify({
      message: {
        token: token.value,
        ...(notification && { notification }),
        ...(data && { data }),
        android: {
          priority: priority === 'high' ? 'HIGH' : 'NORMAL',
          ...(ttlSeconds !== undefined && { ttl: `${ttlSeconds}s` }),
        },
        apns: {
          headers: { 'apns-priority': priority === 'high' ? '10' : '5' },
        },
      },
    });

    return deepFreeze({
      recipient: token.value,
      payload: {
        ...(title !== undefined && { title }),
        ...(body !== undefined && { body }),
        ...(data !== undefined && { data }),
      },
      priority,
      ...(ttlSeconds !== undefined && { ttlSeconds }),
      serialized,
    });
  }

  private normalizeData(
    data: Record<string, unknown> | undefined,
  ): Record<string, string> | undefined {
    if (!data) return undefined;

    const keys = Object.keys(data).sort();
    if (keys.length === 0) return undefined;

    const normalized: Record<string, string> = {};
    for (const key of keys) {
      if (!isAllowedDataKey(key)) {
        throw invalidPayload('invalid_data_key', `Data key "${key}" is empty or reserved`);
      }
      const value = data[key];
      if (typeof value !== 'string') {
        throw invalidPayload('invalid_data_value', `Data value for "${key}" must be a string`);
      }
      normalized[key] = value;
    }
    return normalized;
  }
}

function nonBlank(value: string | undefined): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function isAllowedDataKey(key: string): boolean {
  if (key.length === 0) return false;
  // The gateway matches reserved words case-sensitively.
  if (RESERVED_DATA_KEYS.includes(key)) return false;
  return !RESERVED_DATA_KEY_PREFIXES.some((prefix) => key.startsWith(prefix));
}

function invalidPayload(detail: InvalidPayloadDetail, message: string): PushError {
  return new PushError('INVALID_PAYLOAD', message, detail);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
