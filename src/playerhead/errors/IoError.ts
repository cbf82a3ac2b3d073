export default class IoError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'IoError';
  }

  static wrap(path: string, action: string, err: unknown): IoError {
    const reason = err instanceof Error ? err.message : String(err);
    return new IoError(path, `Failed to ${action} '${path}': ${reason}`, { cause: err });
  }
}
