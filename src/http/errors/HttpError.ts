/**
 * A request that failed on the network level (`httpStatusCode` is `null`)
 * or was answered with an unexpected status code.
 */
export default class HttpError extends Error {
  constructor(
    public readonly url: string,
    public readonly httpStatusCode: number | null,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'HttpError';
  }

  static forUnexpectedStatus(url: string, statusCode: number, body: string): HttpError {
    return new HttpError(url, statusCode, `Request to '${url}' failed: {status=${statusCode}, body=${body}}`);
  }
}
