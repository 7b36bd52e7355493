import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { CREDENTIAL_PROVIDER } from '../push.constants';
import { BearerToken } from '../push.contracts';
import { PushError } from '../push.errors';
import { CredentialProvider } from './credential.provider';

/**
 * Process-wide holder of the current bearer token.
 *
 * The provider is called lazily and the result is shared read-only until
 * someone reports it stale (gateway said 401) or it passes `expiresAt`.
 * Concurrent callers share a single in-flight fetch.
 */
@Injectable()
export class CredentialCache implements OnModuleDestroy {
  private readonly log = new Logger(CredentialCache.name);
  private current: BearerToken | null = null;
  private inflight: Promise<BearerToken> | null = null;

  constructor(
    @Inject(CREDENTIAL_PROVIDER) private readonly provider: CredentialProvider,
  ) {}

  async get(): Promise<BearerToken> {
    if (this.current && !isExpired(this.current)) {
      return this.current;
    }
    return this.fetch();
  }

  /**
   * Replaces `stale` with a fresh token. If another caller already
   * refreshed it, the newer token is returned without a provider call.
   */
  async refresh(stale: BearerToken): Promise<BearerToken> {
    if (this.current === stale) {
      this.log.warn('[refresh] Bearer token reported stale, fetching a new one');
      this.current = null;
    }
    return this.get();
  }

  clear(): void {
    this.current = null;
  }

  onModuleDestroy() {
    this.clear();
  }

  private fetch(): Promise<BearerToken> {
    if (!this.inflight) {
      this.inflight = this.provider
        .getToken()
        .then((token) => {
          this.current = token;
          return token;
        })
        .catch((err: unknown) => {
          this.log.error(
            `[fetch] Credential provider failed: ${err instanceof Error ? err.message : String(err)}`,
          );
          throw new PushError(
            'CREDENTIAL_UNAVAILABLE',
            'Could not obtain gateway credentials',
            undefined,
            { cause: err },
          );
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight;
  }
}

function isExpired(token: BearerToken): boolean {
  return token.expiresAt !== undefined && Date.now() >= token.expiresAt;
}
