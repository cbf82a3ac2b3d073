import IpAddrJs from 'ipaddr.js';
import Net from 'node:net';
import ResolvedToNonUnicastIpError from '../errors/ResolvedToNonUnicastIpError.js';
import type HttpResponse from '../HttpResponse.js';

export type RequestOptions = {
  headers?: Record<string, string>;
};

export default abstract class HttpClient {
  /**
   * @throws HttpError on network failures
   * @throws ResolvedToNonUnicastIpError if the URL points at an IP literal that is not publicly routable
   */
  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    HttpClient.assertPublicHost(url);
    return this.request(url, options);
  }

  /**
   * Sends a GET request to an already validated URL
   */
  protected abstract request(url: string, options: RequestOptions): Promise<HttpResponse>;

  /**
   * Host names are not resolved, only IP literals are checked
   */
  private static assertPublicHost(url: string): void {
    const hostname = new URL(url).hostname.replace(/^\[(.*)]$/, '$1');
    if (Net.isIP(hostname) === 0) {
      return;
    }

    const range = IpAddrJs.parse(hostname).range();
    if (range !== 'unicast') {
      throw new ResolvedToNonUnicastIpError(url, range);
    }
  }
}
