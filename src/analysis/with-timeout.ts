import { AnalysisTransientError } from '../common/errors';

/**
 * Races `work` against a timer. The loser is not cancelled; a late result is ignored.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, what: string): Promise<T> {
  let cancelTimer: () => void = () => {};
  const timeout = new Promise<never>((_, reject) => {
    const handle = setTimeout(
      () => reject(new AnalysisTransientError(`${what} timed out after ${ms}ms`)),
      ms,
    );
    cancelTimer = () => clearTimeout(handle);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    cancelTimer();
  }
}
