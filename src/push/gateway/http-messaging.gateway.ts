import { Inject, Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import { PushConfig } from '../../config/push.config';
import { PUSH_CONFIG, PUSH_HTTP_ADAPTER } from '../push.constants';
import { BearerToken, Envelope } from '../push.contracts';
import {
  GatewayResponse,
  GatewaySendOptions,
  MessagingGateway,
} from './messaging.gateway';

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

// 401 with this code means the gateway's own APNs/web-push credentials are
// broken; a new bearer token will not help.
const THIRD_PARTY_AUTH_ERROR = 'THIRD_PARTY_AUTH_ERROR';

/**
 * FCM HTTP v1 style gateway over a single keep-alive axios client.
 * Built once per process by Nest and torn down on shutdown.
 */
@Injectable()
export class HttpMessagingGateway implements MessagingGateway, OnModuleDestroy {
  private readonly log = new Logger(HttpMessagingGateway.name);
  private readonly url: string;
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private readonly client: AxiosInstance;
  private closed = false;

  constructor(
    @Inject(PUSH_CONFIG) config: PushConfig,
    @Optional() @Inject(PUSH_HTTP_ADAPTER) adapter?: AxiosAdapter,
  ) {
    if (!config.gatewayUrl) {
      throw new Error('PUSH_GATEWAY_URL not configured');
    }
    this.url = config.gatewayUrl;
    this.client = axios.create({
      timeout: config.gatewayTimeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: { 'Content-Type': 'application/json' },
      // Every status is classified below instead of thrown.
      validateStatus: () => true,
      ...(adapter && { adapter }),
    });
  }

  async send(
    envelope: Envelope,
    bearer: BearerToken,
    options: GatewaySendOptions,
  ): Promise<GatewayResponse> {
    if (this.closed) {
      return { kind: 'permanent', reason: 'gateway_closed' };
    }

    try {
      const response = await this.client.post<unknown>(this.url, envelope.serialized, {
        headers: { Authorization: `Bearer ${bearer.value}` },
        // `timeout` only covers an idle socket; the signal bounds the whole call.
        timeout: options.timeoutMs,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      return classifyHttpResponse(
        response.status,
        response.data,
        response.headers['retry-after'],
      );
    } catch (err) {
      if (!axios.isAxiosError(err)) throw err;

      if (err.response) {
        return classifyHttpResponse(
          err.response.status,
          err.response.data,
          err.response.headers['retry-after'],
        );
      }

      this.log.debug(`[send] Transport error: ${err.code ?? 'unknown'} ${err.message}`);
      return classifyTransportError(err.code);
    }
  }

  onModuleDestroy() {
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

/**
 * Maps an HTTP reply from the gateway onto the three-way contract
 * (plus `unauthorized`, which triggers a credential refresh).
 */
export function classifyHttpResponse(
  status: number,
  data: unknown,
  retryAfter?: unknown,
  now: number = Date.now(),
): GatewayResponse {
  if (status >= 200 && status < 300) {
    if (isRecord(data) && typeof data.name === 'string' && data.name.length > 0) {
      return { kind: 'success', messageId: data.name };
    }
    return { kind: 'permanent', reason: 'malformed_gateway_response' };
  }

  const reason = gatewayErrorCode(data) ?? `http_${status}`;

  if (status === 401) {
    return reason === THIRD_PARTY_AUTH_ERROR
      ? { kind: 'permanent', reason }
      : { kind: 'unauthorized', reason };
  }

  if (TRANSIENT_STATUSES.has(status) || status >= 500) {
    const retryAfterMs = parseRetryAfter(retryAfter, now);
    return retryAfterMs === undefined
      ? { kind: 'transient', reason }
      : { kind: 'transient', reason, retryAfterMs };
  }

  return { kind: 'permanent', reason };
}

/**
 * No response at all: timeouts and connection failures are worth retrying.
 * ERR_CANCELED comes from the per-call deadline signal.
 */
export function classifyTransportError(code: string | undefined): GatewayResponse {
  if (code === 'ECONNABORTED' || code === 'ETIMEDOUT' || code === 'ERR_CANCELED') {
    return { kind: 'transient', reason: 'timeout' };
  }
  return { kind: 'transient', reason: code ? code.toLowerCase() : 'network_error' };
}

/**
 * Retry-After as delta-seconds or an HTTP date, in milliseconds.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value * 1000 : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') return undefined;

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function gatewayErrorCode(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  const error = data.error;
  if (!isRecord(error)) return undefined;

  const details = error.details;
  if (Array.isArray(details)) {
    for (const detail of details) {
      if (isRecord(detail) && typeof detail.errorCode === 'string') {
        return detail.errorCode;
      }
    }
  }

  return typeof error.status === 'string' ? error.status : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
