export type PushErrorCode =
  | 'INVALID_PAYLOAD'
  | 'EMPTY_BATCH'
  | 'INVALID_BATCH'
  | 'CREDENTIAL_UNAVAILABLE';

export type InvalidPayloadDetail =
  | 'empty_payload'
  | 'invalid_data_key'
  | 'invalid_data_value'
  | 'invalid_ttl'
  | 'payload_too_large';

/**
 * Call-level failure. Individual message failures are reported as
 * outcomes, never thrown; INVALID_PAYLOAD is caught by the dispatch
 * service and turned into a permanent_failure outcome.
 */
export class PushError extends Error {
  constructor(
    public readonly code: PushErrorCode,
    message: string,
    public readonly detail?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PushError';
  }
}

export function isPushError(err: unknown, code?: PushErrorCode): err is PushError {
  return err instanceof PushError && (code === undefined || err.code === code);
}
