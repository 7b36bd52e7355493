// ============ Caller Input ============

export type PushPriority = 'normal' | 'high';

export interface NotificationPayload {
  title?: string;
  body?: string;
  data?: Record<string, string>;
}

export interface DispatchRequest {
  token: string;
  payload: NotificationPayload;
  priority?: PushPriority;
  ttlSeconds?: number;
}

export interface DispatchOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

// ============ Envelope ============

/**
 * A recipient token that passed validation. Only TokenValidator creates these.
 */
export interface ValidToken {
  readonly value: string;
}

export interface Envelope {
  readonly recipient: string;
  readonly payload: Readonly<{
    title?: string;
    body?: string;
    data?: Readonly<Record<string, string>>;
  }>;
  readonly priority: PushPriority;
  readonly ttlSeconds?: number;
  /** Gateway request body, ready to send as-is. */
  readonly serialized: string;
}

// ============ Credentials ============

export interface BearerToken {
  value: string;
  /** Epoch ms after which the token must not be used. */
  expiresAt?: number;
}

// ============ Outcomes ============

export interface DeliveredOutcome {
  status: 'delivered';
  gatewayMessageId: string;
  attempts: number;
}

export interface TransientFailureOutcome {
  status: 'transient_failure';
  reason: string;
  attempts: number;
}

export interface PermanentFailureOutcome {
  status: 'permanent_failure';
  reason: string;
  detail?: string;
  attempts: number;
}

export type InvalidRecipientReason =
  | 'token_not_string'
  | 'empty_token'
  | 'token_too_long';

export interface InvalidRecipientOutcome {
  status: 'invalid_recipient';
  reason: InvalidRecipientReason;
}

export type DispatchOutcome =
  | DeliveredOutcome
  | TransientFailureOutcome
  | PermanentFailureOutcome
  | InvalidRecipientOutcome;

/**
 * One outcome per input request, in input order.
 */
export type BatchResult = readonly DispatchOutcome[];

/**
 * Lifecycle of a single envelope inside the engine.
 */
export type EnvelopeState = 'submitted' | 'sending' | 'retrying' | 'terminal';

export const CANCELLED_REASON = 'cancelled';
