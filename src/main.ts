#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { readFile } from 'fs/promises';
import { AppModule } from './app.module';
import { parseDispatchBatch, toDispatchRequests } from './push/dto/dispatch-batch.dto';
import { isPushError } from './push/push.errors';
import { PushDispatchService } from './push/push-dispatch.service';

const log = new Logger('Bootstrap');

export type ContextFactory = () => Promise<INestApplicationContext>;

const createAppContext: ContextFactory = () => NestFactory.createApplicationContext(AppModule);

/**
 * Dispatches the batch file named in `args[0]` and prints the BatchResult.
 *
 * Exit codes: 0 all delivered, 1 anything else (including call-level
 * errors), 2 no file given.
 */
export async function run(
  args: readonly string[],
  createContext: ContextFactory = createAppContext,
): Promise<number> {
  const file = args[0];
  if (!file) {
    log.error('Usage: push-dispatch <batch.json>');
    return 2;
  }

  try {
    const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
    const batch = await parseDispatchBatch(raw);

    const app = await createContext();
    app.enableShutdownHooks();

    try {
      const result = await app
        .get(PushDispatchService)
        .dispatch(toDispatchRequests(batch), { timeoutMs: batch.timeoutMs });

      process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
      return result.every((o) => o.status === 'delivered') ? 0 : 1;
    } finally {
      await app.close();
    }
  } catch (err) {
    if (isPushError(err)) {
      log.error(`${err.code}: ${err.message}`);
    } else {
      log.error(err instanceof Error ? err.stack ?? err.message : String(err));
    }
    return 1;
  }
}

async function bootstrap() {
  process.exitCode = await run(process.argv.slice(2));
}

if (require.main === module) {
  void bootstrap();
}
