import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { loadPushConfig } from '../config/push.config';
import { sleep } from '../common/utils/resilience';
import { CredentialCache } from './credentials/credential-cache';
import { EnvCredentialProvider } from './credentials/env-credential.provider';
import { DispatchEngine } from './dispatch.engine';
import { HttpMessagingGateway } from './gateway/http-messaging.gateway';
import { MessageBuilder } from './message-builder';
import {
  CREDENTIAL_PROVIDER,
  MESSAGING_GATEWAY,
  PUSH_CONFIG,
  PUSH_DELAY,
} from './push.constants';
import { PushDispatchService } from './push-dispatch.service';
import { TokenValidator } from './token-validator';

/**
 * Push dispatch core. Swap MESSAGING_GATEWAY or CREDENTIAL_PROVIDER to
 * target another vendor or credential source.
 */
@Module({
  providers: [
    {
      provide: PUSH_CONFIG,
      useFactory: (cfg: ConfigService) => loadPushConfig(cfg),
      inject: [ConfigService],
    },
    { provide: PUSH_DELAY, useValue: sleep },
    { provide: MESSAGING_GATEWAY, useClass: HttpMessagingGateway },
    { provide: CREDENTIAL_PROVIDER, useClass: EnvCredentialProvider },
    CredentialCache,
    TokenValidator,
    MessageBuilder,
    DispatchEngine,
    PushDispatchService,
  ],
  exports: [PushDispatchService, PUSH_CONFIG],
})
export class PushModule {}
