import * as Sentry from '@sentry/node';
import { container } from 'tsyringe';
import AppConfiguration from '../config/AppConfiguration.js';
import { getAppInfo, IS_PRODUCTION } from '../constants.js';

/**
 * Error reporting is opt-in: without `SENTRY_DSN` nothing leaves the machine
 */
export default class SentrySdk {
  private static enabled = false;

  static init(): void {
    const { sentryDsn } = container.resolve(AppConfiguration).config;
    if (sentryDsn === '') {
      return;
    }

    const appInfo = getAppInfo();
    Sentry.init({
      dsn: sentryDsn,
      environment: IS_PRODUCTION ? 'production' : 'development',
      release: `${appInfo.name}@${appInfo.version}`,
      maxBreadcrumbs: 20,
      initialScope: {
        tags: {
          platform: process.platform,
          arch: process.arch,
          node: process.versions.node
        }
      }
    });
    this.enabled = true;
  }

  /**
   * For errors nobody expected, the stack trace is only printed outside of production
   */
  static logAndCaptureError(error: unknown): void {
    this.captureError(error);

    if (IS_PRODUCTION && error instanceof Error) {
      console.error(`An unexpected error occurred: ${error.message}`);
      return;
    }
    console.error(error);
  }

  static captureError(error: unknown): void {
    if (this.enabled) {
      Sentry.captureException(error);
    }
  }

  static async shutdown(): Promise<void> {
    if (this.enabled) {
      await Sentry.close(5_000);
    }
  }
}
