/**
 * Where per-player diagnostics go. `console` by default, {@link SILENT_ERROR_LOG} with `--quiet`.
 */
export type ErrorLog = Pick<Console, 'error' | 'warn'>;

export const SILENT_ERROR_LOG: ErrorLog = Object.freeze({
  error(): void {
    // quiet
  },
  warn(): void {
    // quiet
  }
});
