import { BearerToken, Envelope } from '../push.contracts';

/**
 * Classified gateway reply. The engine only ever looks at `kind`.
 */
export type GatewayResponse =
  | { kind: 'success'; messageId: string }
  | { kind: 'transient'; reason: string; retryAfterMs?: number }
  | { kind: 'permanent'; reason: string }
  | { kind: 'unauthorized'; reason: string };

export interface GatewaySendOptions {
  timeoutMs: number;
}

/**
 * The vendor endpoint. Only DispatchEngine calls this.
 */
export interface MessagingGateway {
  send(
    envelope: Envelope,
    bearer: BearerToken,
    options: GatewaySendOptions,
  ): Promise<GatewayResponse>;
}
