import { Inject, Injectable } from '@nestjs/common';
import { PushConfig } from '../config/push.config';
import { PUSH_CONFIG } from './push.constants';
import { InvalidRecipientOutcome, ValidToken } from './push.contracts';

export type TokenValidation =
  | { ok: true; token: ValidToken }
  | { ok: false; outcome: InvalidRecipientOutcome };

/**
 * Rejects recipient tokens that can never be delivered.
 * Tokens are opaque: only presence and size are checked.
 */
@Injectable()
export class TokenValidator {
  constructor(@Inject(PUSH_CONFIG) private readonly config: PushConfig) {}

  validate(token: unknown): TokenValidation {
    if (typeof token !== 'string') {
      return invalid('token_not_string');
    }
    if (token.length === 0) {
      return invalid('empty_token');
    }
    if (Buffer.byteLength(token, 'utf8') > this.config.maxTokenBytes) {
      return invalid('token_too_long');
    }
    return { ok: true, token: { value: token } };
  }
}

function invalid(reason: InvalidRecipientOutcome['reason']): TokenValidation {
  return { ok: false, outcome: { status: 'invalid_recipient', reason } };
}

/**
 * Shortens a token for log lines.
 */
export function redactToken(token: string): string {
  return token.length <= 8 ? token : `${token.substring(0, 8)}…`;
}
