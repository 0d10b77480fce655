/**
 * Retry with exponential backoff and jitter
 *
 * Used for the terminal progress write: delay doubles per attempt up to
 * maxDelayMs, with +/-jitterFraction randomness so that workers retrying
 * against the same store spread out.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface RetryConfig {
  /** Base delay in milliseconds (default: 250) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelayMs: number;
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
  /** Tag for log lines (default: 'Retry') */
  label: string;
}

export const DEFAULT_RETRY: RetryConfig = {
  baseDelayMs: 250,
  maxDelayMs: 5000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  label: 'Retry',
};

/**
 * Delay before the retry that follows a zero-indexed failed attempt.
 * Never negative.
 */
export function retryDelay(attempt: number, config?: Partial<RetryConfig>): number {
  const cfg = { ...DEFAULT_RETRY, ...config };
  const capped = Math.min(cfg.baseDelayMs * 2 ** attempt, cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * capped * cfg.jitterFraction;
  return Math.max(0, Math.round(capped + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run fn, retrying errors that pass shouldRetry until maxAttempts is spent.
 * Other errors, and the last retryable one, are rethrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<RetryConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY, ...config };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error) || attempt + 1 >= cfg.maxAttempts) throw error;
      const delay = retryDelay(attempt, cfg);
      console.error(
        `[${cfg.label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed, retrying in ${delay}ms: ${error instanceof Error ? error.message : String(error)}`
      );
      await sleep(delay);
    }
  }
}
