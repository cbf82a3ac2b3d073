import { singleton } from 'tsyringe';
import * as Undici from 'undici';
import { IS_DEBUG } from '../../constants.js';
import HttpError from '../errors/HttpError.js';
import HttpResponse from '../HttpResponse.js';
import UserAgentGenerator from '../UserAgentGenerator.js';
import HttpClient, { RequestOptions } from './HttpClient.js';

/**
 * Talks to the remote server directly, any response is returned no matter its status code
 */
@singleton()
export default class SimpleHttpClient extends HttpClient {
  protected static readonly DEBUG_LOGGING = IS_DEBUG;

  private readonly userAgent = UserAgentGenerator.generateDefault();
  private agent?: Undici.Agent;

  protected async request(url: string, options: RequestOptions): Promise<HttpResponse> {
    if (SimpleHttpClient.DEBUG_LOGGING) {
      console.debug(`[HttpClient] >> GET ${url}`);
    }

    let httpResponse: HttpResponse;
    try {
      httpResponse = await HttpResponse.fromUndiciResponse(await Undici.request(url, {
        dispatcher: this.selectDispatcher(),
        method: 'GET',
        headers: this.createHeaders(options.headers)
      }));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new HttpError(url, null, `Request to '${url}' failed: ${reason}`, { cause: err });
    }

    if (SimpleHttpClient.DEBUG_LOGGING) {
      console.debug(`[HttpClient] << Status ${httpResponse.statusCode} with ${httpResponse.body.length} bytes`);
    }
    return httpResponse;
  }

  protected selectDispatcher(): Undici.Dispatcher {
    if (this.agent == null) {
      this.agent = new Undici.Agent({
        maxRedirections: 5,
        maxResponseSize: 5 * 1024 * 1024 /* 5 MiB */,
        bodyTimeout: 12_000,
        headersTimeout: 12_000
      });
    }
    return this.agent;
  }

  /**
   * Header names are case-insensitive, given headers replace the defaults
   */
  private createHeaders(headers: RequestOptions['headers'] = {}): Record<string, string> {
    const result: Record<string, string> = {
      'user-agent': this.userAgent,
      'accept': 'application/json'
    };
    for (const [name, value] of Object.entries(headers)) {
      result[name.toLowerCase()] = value;
    }
    return result;
  }
}
