#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './modules/app/app.module';
import { ProvisioningRunner } from './modules/provisioning/provisioning-runner.service';
import { applyCliOverrides, buildCli, type BulkProvisionOptions } from './cli/bulk-provision.command';
import { AuthError, ProvisioningError, SourceReadError } from './domain/errors/provisioning-errors';

async function provision(input: string, options: BulkProvisionOptions): Promise<void> {
  applyCliOverrides(options);

  // Nest's own logger stays quiet; the run reports through ProvisioningLogger.
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: false,
    abortOnError: false,
  });

  try {
    await app.get(ProvisioningRunner).execute(input);
  } finally {
    await app.close();
  }
}

async function main(): Promise<void> {
  await buildCli(provision).parseAsync(process.argv);
}

main().catch((err: unknown) => {
  // Sign-in and input failures were already written to the log by the runner.
  if (!(err instanceof AuthError || err instanceof SourceReadError)) {
    const detail = err instanceof ProvisioningError ? err.message : err instanceof Error ? (err.stack ?? err.message) : String(err);
    console.error(detail);
  }
  process.exitCode = 1;
});
