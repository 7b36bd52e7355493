import { Inject, Injectable, Logger } from '@nestjs/common';
import { PushConfig } from '../config/push.config';
import { backoffDelayMs, DelayFn } from '../common/utils/resilience';
import { CredentialCache } from './credentials/credential-cache';
import { GatewayResponse, MessagingGateway } from './gateway/messaging.gateway';
import { MESSAGING_GATEWAY, PUSH_CONFIG, PUSH_DELAY } from './push.constants';
import {
  BearerToken,
  CANCELLED_REASON,
  DispatchOutcome,
  Envelope,
  EnvelopeState,
} from './push.contracts';
import { redactToken } from './token-validator';

export interface SendContext {
  signal?: AbortSignal;
}

/**
 * Sends one envelope to the gateway and turns whatever comes back into a
 * single terminal outcome.
 *
 * Rules:
 * - permanent errors are returned on the first attempt
 * - transient errors are retried up to `maxRetries` times with backoff,
 *   never sooner than the gateway's retry-after hint
 * - every attempt reads the current bearer from the cache, so a token
 *   refreshed or expired mid-batch is never sent again
 * - a 401 refreshes the credential once and resends immediately
 * - after cancellation no further attempt starts
 *
 * The engine does not deduplicate: if an attempt times out locally after
 * the gateway accepted it, the retry may deliver a second copy.
 */
@Injectable()
export class DispatchEngine {
  private readonly log = new Logger(DispatchEngine.name);

  constructor(
    @Inject(PUSH_CONFIG) private readonly config: PushConfig,
    @Inject(MESSAGING_GATEWAY) private readonly gateway: MessagingGateway,
    private readonly credentials: CredentialCache,
    @Inject(PUSH_DELAY) private readonly delay: DelayFn,
  ) {}

  async send(envelope: Envelope, ctx: SendContext = {}): Promise<DispatchOutcome> {
    const who = redactToken(envelope.recipient);
    let attempts = 0;
    let retries = 0;
    let refreshed = false;

    this.transition(who, 'submitted');

    for (;;) {
      if (attempts > 0 && ctx.signal?.aborted) {
        return this.finish(who, { status: 'transient_failure', reason: CANCELLED_REASON, attempts });
      }

      const bearer = await this.currentBearer(who);
      if (!bearer) {
        return this.finish(who, { status: 'transient_failure', reason: 'credential_unavailable', attempts });
      }

      attempts++;
      this.transition(who, 'sending', attempts);
      const response = await this.attempt(envelope, bearer);

      switch (response.kind) {
        case 'success':
          return this.finish(who, {
            status: 'delivered',
            gatewayMessageId: response.messageId,
            attempts,
          });

        case 'permanent':
          return this.finish(who, { status: 'permanent_failure', reason: response.reason, attempts });

        case 'unauthorized': {
          if (refreshed) {
            return this.finish(who, {
              status: 'permanent_failure',
              reason: 'unauthorized',
              detail: response.reason,
              attempts,
            });
          }
          refreshed = true;
          try {
            // The next attempt picks the new token up from the cache.
            await this.credentials.refresh(bearer);
          } catch (err) {
            this.log.warn(
              `[send] ${who} credential refresh failed: ${err instanceof Error ? err.message : String(err)}`,
            );
            return this.finish(who, {
              status: 'transient_failure',
              reason: 'credential_unavailable',
              attempts,
            });
          }
          break;
        }

        case 'transient': {
          if (retries >= this.config.maxRetries) {
            return this.finish(who, { status: 'transient_failure', reason: response.reason, attempts });
          }
          retries++;
          const wait = this.retryDelay(retries, response.retryAfterMs);
          this.transition(who, 'retrying', attempts);
          this.log.warn(
            `[send] ${who} transient failure (${response.reason}), retry ${retries}/${this.config.maxRetries} in ${wait}ms`,
          );
          await this.delay(wait, ctx.signal);
          break;
        }
      }
    }
  }

  /**
   * Backoff for the given retry, stretched to honour retry-after.
   */
  retryDelay(retry: number, retryAfterMs?: number): number {
    const backoff = backoffDelayMs(retry, {
      baseDelayMs: this.config.retryBaseDelayMs,
      factor: this.config.retryFactor,
      maxDelayMs: this.config.retryMaxDelayMs,
    });
    if (retryAfterMs === undefined) return backoff;
    return Math.max(backoff, Math.min(retryAfterMs, this.config.maxRetryAfterMs));
  }

  private async currentBearer(who: string): Promise<BearerToken | null> {
    try {
      return await this.credentials.get();
    } catch (err) {
      this.log.warn(
        `[send] ${who} credential unavailable: ${err instanceof Error ? err.message : String(err)}`,
      );
      return null;
    }
  }

  private async attempt(envelope: Envelope, bearer: BearerToken): Promise<GatewayResponse> {
    try {
      return await this.gateway.send(envelope, bearer, {
        timeoutMs: this.config.gatewayTimeoutMs,
      });
    } catch (err) {
      this.log.error(
        `[attempt] Gateway threw for ${redactToken(envelope.recipient)}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return { kind: 'transient', reason: 'gateway_error' };
    }
  }

  private transition(who: string, state: EnvelopeState, attempt?: number) {
    this.log.debug(`[state] ${who} -> ${state}${attempt ? ` (attempt ${attempt})` : ''}`);
  }

  private finish(who: string, outcome: DispatchOutcome): DispatchOutcome {
    this.transition(who, 'terminal');
    this.log.debug(`[send] ${who} finished: ${outcome.status}`);
    return outcome;
  }
}
