import { ScrapeError } from "../errors";
import { logger } from "../utils/logger";

export type AttemptOutcome<C, T> =
  | { ok: true; candidate: C; value: T }
  | { ok: false; tried: C[]; lastError?: ScrapeError };

/**
 * Runs `attempt` on each candidate in order and returns the first success.
 * Scrape failures move on to the next candidate; any other error is thrown
 * as is.
 */
export async function firstSuccess<C, T>(
  candidates: Iterable<C>,
  attempt: (candidate: C) => Promise<T> | T,
  label = "attempt"
): Promise<AttemptOutcome<C, T>> {
  const tried: C[] = [];
  let lastError: ScrapeError | undefined;

  for (const candidate of candidates) {
    tried.push(candidate);
    try {
      const value = await attempt(candidate);
      return { ok: true, candidate, value };
    } catch (error) {
      if (!(error instanceof ScrapeError)) throw error;
      logger.debug(`${label} ${String(candidate)} failed:`, error.message);
      lastError = error;
    }
  }

  return { ok: false, tried, lastError };
}
