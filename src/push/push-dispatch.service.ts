import { Inject, Injectable, Logger } from '@nestjs/common';
import { PushConfig } from '../config/push.config';
import { linkAbortSignal, runWithConcurrency } from '../common/utils/resilience';
import { CredentialCache } from './credentials/credential-cache';
import { DispatchEngine } from './dispatch.engine';
import { MessageBuilder } from './message-builder';
import { PUSH_CONFIG } from './push.constants';
import {
  BatchResult,
  CANCELLED_REASON,
  DispatchOptions,
  DispatchRequest,
  Envelope,
  TransientFailureOutcome,
} from './push.contracts';
import { isPushError, PushError } from './push.errors';
import { ResultAggregator } from './result-aggregator';
import { TokenValidator } from './token-validator';

interface QueuedEnvelope {
  index: number;
  envelope: Envelope;
}

/**
 * Caller-facing entry point: one batch in, one outcome per request out.
 *
 * Only an empty/oversized batch or missing credentials fail the call;
 * everything else is reported per message, so callers must inspect each
 * entry of the result.
 */
@Injectable()
export class PushDispatchService {
  private readonly log = new Logger(PushDispatchService.name);

  constructor(
    @Inject(PUSH_CONFIG) private readonly config: PushConfig,
    private readonly validator: TokenValidator,
    private readonly builder: MessageBuilder,
    private readonly engine: DispatchEngine,
    private readonly credentials: CredentialCache,
  ) {}

  async dispatch(
    batch: readonly DispatchRequest[],
    options: DispatchOptions = {},
  ): Promise<BatchResult> {
    if (batch.length === 0) {
      throw new PushError('EMPTY_BATCH', 'Batch must contain at least one message');
    }
    if (batch.length > this.config.maxBatchSize) {
      throw new PushError(
        'INVALID_BATCH',
        `Batch of ${batch.length} exceeds the limit of ${this.config.maxBatchSize}`,
      );
    }

    const started = Date.now();
    const aggregator = new ResultAggregator(batch.length);
    const queue = this.prepare(batch, aggregator);

    this.log.log(
      `[dispatch] Batch of ${batch.length}: ${queue.length} sendable, ${batch.length - queue.length} rejected locally`,
    );

    if (queue.length > 0) {
      const { signal, dispose } = linkAbortSignal(options.signal, options.timeoutMs);
      try {
        await this.sendAll(queue, aggregator, signal);
      } finally {
        dispose();
      }
    }

    const result = aggregator.toBatchResult();
    const delivered = result.filter((o) => o.status === 'delivered').length;
    this.log.log(
      `[dispatch] Done in ${Date.now() - started}ms: ${delivered}/${result.length} delivered`,
    );
    return result;
  }

  /**
   * Validates recipients and builds envelopes. Local rejections are
   * recorded straight away and never reach the gateway.
   */
  private prepare(
    batch: readonly DispatchRequest[],
    aggregator: ResultAggregator,
  ): QueuedEnvelope[] {
    const queue: QueuedEnvelope[] = [];

    batch.forEach((request, index) => {
      const checked = this.validator.validate(request.token);
      if (!checked.ok) {
        aggregator.record(index, checked.outcome);
        return;
      }

      try {
        const envelope = this.builder.build(checked.token, request.payload ?? {}, {
          priority: request.priority,
          ttlSeconds: request.ttlSeconds,
        });
        queue.push({ index, envelope });
      } catch (err) {
        if (!isPushError(err, 'INVALID_PAYLOAD')) throw err;
        aggregator.record(index, {
          status: 'permanent_failure',
          reason: 'invalid_payload',
          detail: err.detail,
          attempts: 0,
        });
      }
    });

    return queue;
  }

  private async sendAll(
    queue: QueuedEnvelope[],
    aggregator: ResultAggregator,
    signal: AbortSignal,
  ): Promise<void> {
    if (signal.aborted) {
      queue.forEach(({ index }) => aggregator.record(index, cancelled()));
      return;
    }

    // Warms the shared cache once for the batch; CREDENTIAL_UNAVAILABLE fails
    // the call. Each send then reads whatever the cache currently holds.
    await this.credentials.get();

    await runWithConcurrency(queue, this.config.concurrency, async ({ index, envelope }) => {
      if (signal.aborted) {
        aggregator.record(index, cancelled());
        return;
      }
      aggregator.record(index, await this.engine.send(envelope, { signal }));
    });

    if (signal.aborted) {
      this.log.warn('[dispatch] Batch cancelled, unsent envelopes reported as cancelled');
    }
  }
}

function cancelled(): TransientFailureOutcome {
  return { status: 'transient_failure', reason: CANCELLED_REASON, attempts: 0 };
}
