#!/usr/bin/env node
import './container-init.js';
import { container } from 'tsyringe';
import type App from './boot/App.js';
import CommandLineApp from './boot/CommandLineApp.js';
import CliArgumentProvider from './cli/CliArgumentProvider.js';
import { SILENT_ERROR_LOG, type ErrorLog } from './util/ErrorLog.js';
import SentrySdk from './util/SentrySdk.js';

let app: App | undefined;

bootstrap()
  .catch((err: unknown) => {
    SentrySdk.logAndCaptureError(err);
    process.exitCode = 1;
  });

async function bootstrap(): Promise<void> {
  const args = CliArgumentProvider.determineAppArguments();
  if (args.quiet) {
    container.registerInstance<ErrorLog>('ErrorLog', SILENT_ERROR_LOG);
  }

  SentrySdk.init();
  registerShutdownHooks();

  app = new CommandLineApp(args);
  await app.boot();

  await container.dispose();
  await SentrySdk.shutdown();
}

function registerShutdownHooks(): void {
  let shutdownInProgress = false;
  const handleShutdown = async (): Promise<void> => {
    if (shutdownInProgress) {
      console.warn('Received second shutdown signal – Forcing shutdown');
      process.exit(90);
    }

    shutdownInProgress = true;
    await app?.shutdown();
  };

  for (const signal of ['SIGTERM', 'SIGINT', 'SIGQUIT', 'SIGHUP'] as const) {
    process.on(signal, () => {
      handleShutdown()
        .catch((err: unknown) => SentrySdk.logAndCaptureError(err));
    });
  }
}
