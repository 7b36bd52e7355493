import { ConfigService } from '@nestjs/config';

/**
 * Runtime settings for the dispatch core.
 */
export interface PushConfig {
  gatewayUrl?: string;
  gatewayTimeoutMs: number;
  maxTokenBytes: number;
  maxPayloadBytes: number;
  maxBatchSize: number;
  concurrency: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryFactor: number;
  retryMaxDelayMs: number;
  maxRetryAfterMs: number;
}

export const DEFAULT_PUSH_CONFIG: Readonly<PushConfig> = {
  gatewayTimeoutMs: 10_000,
  maxTokenBytes: 4096,
  maxPayloadBytes: 4096,
  maxBatchSize: 500,
  concurrency: 10,
  maxRetries: 3,
  retryBaseDelayMs: 500,
  retryFactor: 2,
  retryMaxDelayMs: 4000,
  maxRetryAfterMs: 60_000,
};

function numberFrom(cfg: ConfigService, key: string, fallback: number): number {
  const raw = cfg.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Build push config from env with defaults.
 */
export function loadPushConfig(cfg: ConfigService): PushConfig {
  return {
    gatewayUrl: cfg.get<string>('PUSH_GATEWAY_URL') || undefined,
    gatewayTimeoutMs: numberFrom(cfg, 'PUSH_GATEWAY_TIMEOUT_MS', DEFAULT_PUSH_CONFIG.gatewayTimeoutMs),
    maxTokenBytes: numberFrom(cfg, 'PUSH_MAX_TOKEN_BYTES', DEFAULT_PUSH_CONFIG.maxTokenBytes),
    maxPayloadBytes: numberFrom(cfg, 'PUSH_MAX_PAYLOAD_BYTES', DEFAULT_PUSH_CONFIG.maxPayloadBytes),
    maxBatchSize: numberFrom(cfg, 'PUSH_MAX_BATCH_SIZE', DEFAULT_PUSH_CONFIG.maxBatchSize),
    concurrency: numberFrom(cfg, 'PUSH_CONCURRENCY', DEFAULT_PUSH_CONFIG.concurrency),
    maxRetries: numberFrom(cfg, 'PUSH_MAX_RETRIES', DEFAULT_PUSH_CONFIG.maxRetries),
    retryBaseDelayMs: numberFrom(cfg, 'PUSH_RETRY_BASE_MS', DEFAULT_PUSH_CONFIG.retryBaseDelayMs),
    retryFactor: numberFrom(cfg, 'PUSH_RETRY_FACTOR', DEFAULT_PUSH_CONFIG.retryFactor),
    retryMaxDelayMs: numberFrom(cfg, 'PUSH_RETRY_MAX_MS', DEFAULT_PUSH_CONFIG.retryMaxDelayMs),
    maxRetryAfterMs: numberFrom(cfg, 'PUSH_MAX_RETRY_AFTER_MS', DEFAULT_PUSH_CONFIG.maxRetryAfterMs),
  };
}
