/**
 * Exponential backoff: base * 2^(attempt-1), capped at maxMs.
 * `attempt` is the attempt that just failed (1-based).
 */
export function retryDelayMs(attempt: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}
