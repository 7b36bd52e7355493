import { PushConfig } from '../config/push.config';
import { CredentialCache } from './credentials/credential-cache';
import { DispatchEngine } from './dispatch.engine';
import { BearerToken, Envelope } from './push.contracts';
import { MessageBuilder } from './message-builder';
import { PushDispatchService } from './push-dispatch.service';
import { noDelay, ScriptedGateway, SequenceCredentialProvider, testConfig } from './testing/fakes';
import { TokenValidator } from './token-validator';

function setup(overrides: Partial<PushConfig> = {}, onSend?: (envelope: Envelope) => void) {
  const config = testConfig(overrides);
  const gateway = new ScriptedGateway(onSend);
  const provider = new SequenceCredentialProvider();
  const credentials = new CredentialCache(provider);
  const delay = jest.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve());
  const engine = new DispatchEngine(config, gateway, credentials, delay);
  const service = new PushDispatchService(
    config,
    new TokenValidator(config),
    new MessageBuilder(config),
    engine,
    credentials,
  );
  return { service, gateway, provider, delay };
}

describe('PushDispatchService', () => {
  it('delivers a single message', async () => {
    const { service, gateway } = setup();
    gateway.script('tokA', { kind: 'success', messageId: 'msg-1' });

    const result = await service.dispatch([{ token: 'tokA', payload: { title: 'Hi' } }]);

    expect(result).toEqual([{ status: 'delivered', gatewayMessageId: 'msg-1', attempts: 1 }]);
  });

  it('rejects an empty recipient without touching the gateway', async () => {
    const { service, gateway, provider } = setup();

    const result = await service.dispatch([{ token: '', payload: { title: 'Hi' } }]);

    expect(result).toEqual([{ status: 'invalid_recipient', reason: 'empty_token' }]);
    expect(gateway.calls).toHaveLength(0);
    expect(provider.calls).toBe(0);
  });

  it('rejects an oversized recipient without touching the gateway', async () => {
    const { service, gateway } = setup();

    const result = await service.dispatch([{ token: 'x'.repeat(4097), payload: { title: 'Hi' } }]);

    expect(result).toEqual([{ status: 'invalid_recipient', reason: 'token_too_long' }]);
    expect(gateway.calls).toHaveLength(0);
  });

  it('reports an empty payload as a permanent failure', async () => {
    const { service, gateway } = setup();

    const result = await service.dispatch([{ token: 'tokB', payload: {} }]);

    expect(result).toEqual([
      { status: 'permanent_failure', reason: 'invalid_payload', detail: 'empty_payload', attempts: 0 },
    ]);
    expect(gateway.calls).toHaveLength(0);
  });

  it('surfaces exhausted transient failures after three retries', async () => {
    const { service, gateway, delay } = setup();
    const unavailable = { kind: 'transient', reason: 'UNAVAILABLE' } as const;
    gateway.script('tokC', unavailable, unavailable, unavailable, unavailable);

    const result = await service.dispatch([{ token: 'tokC', payload: { title: 'Hi' } }]);

    expect(result).toEqual([{ status: 'transient_failure', reason: 'UNAVAILABLE', attempts: 4 }]);
    expect(delay.mock.calls.map(([ms]) => ms)).toEqual([500, 1000, 2000]);
  });

  it('fails the whole call when credentials are unavailable', async () => {
    const { service, gateway, provider } = setup();
    provider.failure = new Error('no service account');

    await expect(
      service.dispatch([{ token: 'tokA', payload: { title: 'Hi' } }]),
    ).rejects.toMatchObject({ code: 'CREDENTIAL_UNAVAILABLE' });
    expect(gateway.calls).toHaveLength(0);
  });

  it('rejects an empty batch', async () => {
    const { service } = setup();
    await expect(service.dispatch([])).rejects.toMatchObject({ code: 'EMPTY_BATCH' });
  });

  it('rejects a batch above the size limit', async () => {
    const { service } = setup({ maxBatchSize: 2 });
    const message = { token: 'tokA', payload: { title: 'Hi' } };
    await expect(service.dispatch([message, message, message])).rejects.toMatchObject({
      code: 'INVALID_BATCH',
    });
  });

  it('keeps input order for a mixed batch that completes out of order', async () => {
    const { service, gateway } = setup();
    gateway
      .latency('slow', 30)
      .latency('fast', 1)
      .script('gone', { kind: 'permanent', reason: 'UNREGISTERED' });

    const result = await service.dispatch([
      { token: 'slow', payload: { title: 'one' } },
      { token: '', payload: { title: 'two' } },
      { token: 'fast', payload: { title: 'three' } },
      { token: 'tokB', payload: {} },
      { token: 'gone', payload: { body: 'five' } },
    ]);

    expect(result).toEqual([
      { status: 'delivered', gatewayMessageId: 'msg-slow', attempts: 1 },
      { status: 'invalid_recipient', reason: 'empty_token' },
      { status: 'delivered', gatewayMessageId: 'msg-fast', attempts: 1 },
      { status: 'permanent_failure', reason: 'invalid_payload', detail: 'empty_payload', attempts: 0 },
      { status: 'permanent_failure', reason: 'UNREGISTERED', attempts: 1 },
    ]);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('fetches the credential once per batch', async () => {
    const { service, provider } = setup();
    const batch = ['a', 'b', 'c', 'd', 'e'].map((token) => ({ token, payload: { title: 'Hi' } }));

    await service.dispatch(batch);

    expect(provider.calls).toBe(1);
  });

  it('never has more sends in flight than the concurrency limit', async () => {
    const { service, gateway } = setup();
    const batch = Array.from({ length: 25 }, (_, i) => ({ token: `tok-${i}`, payload: { title: 'Hi' } }));

    const result = await service.dispatch(batch);

    expect(gateway.maxInFlight).toBe(10);
    expect(result).toHaveLength(25);
    expect(result.every((o) => o.status === 'delivered')).toBe(true);
  });

  it('sends the rest of the batch with the refreshed credential after a 401', async () => {
    const { service, gateway, provider } = setup({ concurrency: 1 });
    gateway.script('tokA', { kind: 'unauthorized', reason: 'UNAUTHENTICATED' });

    const result = await service.dispatch(
      ['tokA', 'tokB', 'tokC'].map((token) => ({ token, payload: { title: 'Hi' } })),
    );

    expect(result).toEqual([
      { status: 'delivered', gatewayMessageId: 'msg-tokA', attempts: 2 },
      { status: 'delivered', gatewayMessageId: 'msg-tokB', attempts: 1 },
      { status: 'delivered', gatewayMessageId: 'msg-tokC', attempts: 1 },
    ]);
    expect(gateway.calls.map((c) => `${c.recipient}:${c.bearer}`)).toEqual([
      'tokA:test-token-1',
      'tokA:test-token-2',
      'tokB:test-token-2',
      'tokC:test-token-2',
    ]);
    expect(provider.calls).toBe(2);
  });

  it('shares one refresh between sends that hit a 401 together', async () => {
    const { service, gateway, provider } = setup({ concurrency: 2 });
    const unauthorized = { kind: 'unauthorized', reason: 'UNAUTHENTICATED' } as const;
    gateway.script('tokA', unauthorized).script('tokB', unauthorized);

    const result = await service.dispatch([
      { token: 'tokA', payload: { title: 'Hi' } },
      { token: 'tokB', payload: { title: 'Hi' } },
    ]);

    expect(result.map((o) => o.status)).toEqual(['delivered', 'delivered']);
    expect(gateway.callsFor('tokA').map((c) => c.bearer)).toEqual(['test-token-1', 'test-token-2']);
    expect(gateway.callsFor('tokB').map((c) => c.bearer)).toEqual(['test-token-1', 'test-token-2']);
    expect(provider.calls).toBe(2);
  });

  it('re-fetches the credential once it expires mid-batch', async () => {
    const config = testConfig({ concurrency: 1 });
    const gateway = new ScriptedGateway().latency('tokA', 40);
    const getToken = jest
      .fn<Promise<BearerToken>, []>()
      .mockImplementationOnce(async () => ({ value: 'test-token-1', expiresAt: Date.now() + 20 }))
      .mockImplementationOnce(async () => ({ value: 'test-token-2' }));
    const credentials = new CredentialCache({ getToken });
    const service = new PushDispatchService(
      config,
      new TokenValidator(config),
      new MessageBuilder(config),
      new DispatchEngine(config, gateway, credentials, noDelay),
      credentials,
    );

    const result = await service.dispatch([
      { token: 'tokA', payload: { title: 'Hi' } },
      { token: 'tokB', payload: { title: 'Hi' } },
    ]);

    expect(result.map((o) => o.status)).toEqual(['delivered', 'delivered']);
    expect(gateway.calls.map((c) => `${c.recipient}:${c.bearer}`)).toEqual([
      'tokA:test-token-1',
      'tokB:test-token-2',
    ]);
    expect(getToken).toHaveBeenCalledTimes(2);
  });

  it('reports everything as cancelled when the signal is already aborted', async () => {
    const { service, gateway, provider } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await service.dispatch(
      [
        { token: 'tokA', payload: { title: 'Hi' } },
        { token: '', payload: { title: 'Hi' } },
      ],
      { signal: controller.signal },
    );

    expect(result).toEqual([
      { status: 'transient_failure', reason: 'cancelled', attempts: 0 },
      { status: 'invalid_recipient', reason: 'empty_token' },
    ]);
    expect(gateway.calls).toHaveLength(0);
    expect(provider.calls).toBe(0);
  });

  it('lets in-flight sends finish but starts no new ones after cancellation', async () => {
    const controller = new AbortController();
    const { service, gateway } = setup({ concurrency: 1 }, () => controller.abort());

    const result = await service.dispatch(
      ['tokA', 'tokB', 'tokC'].map((token) => ({ token, payload: { title: 'Hi' } })),
      { signal: controller.signal },
    );

    expect(result).toEqual([
      { status: 'delivered', gatewayMessageId: 'msg-tokA', attempts: 1 },
      { status: 'transient_failure', reason: 'cancelled', attempts: 0 },
      { status: 'transient_failure', reason: 'cancelled', attempts: 0 },
    ]);
    expect(gateway.calls).toHaveLength(1);
  });

  it('cancels unsent envelopes when the batch timeout elapses', async () => {
    const { service, gateway } = setup({ concurrency: 1 });
    gateway.latency('tokA', 60).latency('tokB', 60);

    const result = await service.dispatch(
      [
        { token: 'tokA', payload: { title: 'Hi' } },
        { token: 'tokB', payload: { title: 'Hi' } },
      ],
      { timeoutMs: 10 },
    );

    expect(result).toEqual([
      { status: 'delivered', gatewayMessageId: 'msg-tokA', attempts: 1 },
      { status: 'transient_failure', reason: 'cancelled', attempts: 0 },
    ]);
  });
});
