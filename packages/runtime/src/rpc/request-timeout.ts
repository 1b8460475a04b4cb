export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export function isValidTimeoutMs(timeoutMs: unknown): timeoutMs is number {
  return (
    typeof timeoutMs === "number" &&
    Number.isFinite(timeoutMs) &&
    Number.isInteger(timeoutMs) &&
    timeoutMs > 0
  );
}

export function resolveRequestTimeoutMs(timeoutMs: number | undefined, fallbackMs = DEFAULT_REQUEST_TIMEOUT_MS): number {
  if (isValidTimeoutMs(timeoutMs)) {
    return timeoutMs;
  }
  return isValidTimeoutMs(fallbackMs) ? fallbackMs : DEFAULT_REQUEST_TIMEOUT_MS;
}
