/**
 * Stderr logger for the rings and their config loader.
 *
 * Ring operations that resolve to a no-op (empty ring, unmatched search,
 * invalid index) trace through `debug()`, which stays silent until enabled by
 * `applyConfig` or CURSOR_RINGS_DEBUG. Config problems go to `warn()`/`error()`.
 */

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function timestamp(): string {
  return new Date().toISOString();
}

export function debug(message: string): void {
  if (debugEnabled) {
    process.stderr.write(`[cursor-rings ${timestamp()}] ${message}\n`);
  }
}

export function warn(message: string): void {
  process.stderr.write(`[cursor-rings warn] ${message}\n`);
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err) return String(err);
  return '';
}

export function error(message: string, err?: unknown): void {
  const detail = err ? `: ${formatError(err)}` : '';
  process.stderr.write(`[cursor-rings error] ${message}${detail}\n`);
}
