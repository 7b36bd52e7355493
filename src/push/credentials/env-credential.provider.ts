import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BearerToken } from '../push.contracts';
import { CredentialProvider } from './credential.provider';

/**
 * Reads a pre-issued bearer token from PUSH_GATEWAY_TOKEN.
 */
@Injectable()
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly cfg: ConfigService) {}

  async getToken(): Promise<BearerToken> {
    const value = this.cfg.get<string>('PUSH_GATEWAY_TOKEN');
    if (!value) {
      throw new Error('PUSH_GATEWAY_TOKEN not configured');
    }
    return { value };
  }
}
