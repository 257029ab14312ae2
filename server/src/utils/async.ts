/**
 * Timeouts, backoff and sleep helpers
 */

import { EngineError, EngineErrorKind } from './errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a deadline. The underlying work is not cancelled;
 * callers treat the rejection as a local failure.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) {
    throw new EngineError(EngineErrorKind.DeadlineExceeded, `${label}: no time budget left`);
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new EngineError(EngineErrorKind.DeadlineExceeded, `${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch with an AbortController timeout
 */
export async function fetchWithTimeout(url: string, options: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new EngineError(
        EngineErrorKind.DeadlineExceeded,
        `Request to ${new URL(url).hostname} timed out after ${timeoutMs}ms`
      );
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** returns a value in [0, 1) */
  random?: () => number;
}

/**
 * Exponential delay for the given 1-based attempt, capped, with ±25% jitter
 */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  const random = options.random ?? Math.random;
  const exp = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** Math.max(0, attempt - 1));
  const jitter = (random() - 0.5) * 0.5;
  return Math.max(0, Math.min(options.maxDelayMs, Math.floor(exp * (1 + jitter))));
}
