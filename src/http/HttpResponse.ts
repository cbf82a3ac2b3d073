import type * as Undici from 'undici';

export type HttpHeaders = ReadonlyMap<string, string | string[]>;

export default class HttpResponse {
  constructor(
    public readonly statusCode: number,
    /** Header names are lowercase */
    public readonly headers: HttpHeaders,
    public readonly body: Buffer
  ) {
  }

  get ok(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  get rateLimited(): boolean {
    return this.statusCode === 429;
  }

  /**
   * Mojang's APIs answer with either 204 or 404 when there is nothing to be found
   */
  get notFound(): boolean {
    return this.statusCode === 204 || this.statusCode === 404;
  }

  parseBodyAsText(): string {
    return this.body.toString('utf-8');
  }

  /**
   * @throws SyntaxError
   */
  parseBodyAsJson(): unknown {
    return JSON.parse(this.parseBodyAsText());
  }

  static async fromUndiciResponse(response: Undici.Dispatcher.ResponseData): Promise<HttpResponse> {
    const headers = new Map<string, string | string[]>();
    for (const [name, value] of Object.entries(response.headers)) {
      if (value !== undefined) {
        headers.set(name.toLowerCase(), value);
      }
    }

    return new HttpResponse(response.statusCode, headers, Buffer.from(await response.body.arrayBuffer()));
  }
}
