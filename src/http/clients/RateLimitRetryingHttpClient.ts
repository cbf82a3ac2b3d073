import { inject, singleton } from 'tsyringe';
import type { ErrorLog } from '../../util/ErrorLog.js';
import type HttpResponse from '../HttpResponse.js';
import HttpClient, { RequestOptions } from './HttpClient.js';
import SimpleHttpClient from './SimpleHttpClient.js';

export type Sleep = (millis: number) => Promise<void>;

/**
 * Retries requests answered with `429 Too Many Requests`, waiting a bit longer each time.
 * When the last retry is rate limited too, that response is returned as-is.
 */
@singleton()
export default class RateLimitRetryingHttpClient extends HttpClient {
  private static readonly RETRY_DELAYS: readonly { millis: number, description: string }[] = [
    { millis: 1_000, description: 'Rate limited, trying again in a second' },
    { millis: 10_000, description: 'Still rate limited, trying again in 10 seconds' },
    { millis: 60_000, description: 'Still rate limited, trying again in a minute' }
  ];

  constructor(
    private readonly httpClient: SimpleHttpClient,
    @inject('ErrorLog') private readonly errorLog: ErrorLog,
    @inject('value.sleep') private readonly sleep: Sleep
  ) {
    super();
  }

  protected async request(url: string, options: RequestOptions): Promise<HttpResponse> {
    let response = await this.httpClient.get(url, options);

    for (const retryDelay of RateLimitRetryingHttpClient.RETRY_DELAYS) {
      if (!response.rateLimited) {
        return response;
      }

      this.errorLog.warn(retryDelay.description);
      await this.sleep(retryDelay.millis);
      response = await this.httpClient.get(url, options);
    }

    if (response.rateLimited) {
      this.errorLog.warn('Still rate limited, giving up');
    }
    return response;
  }
}
