import type { ErrorClassification } from '@event-relay/shared';

export interface RetryPolicyConfig {
  baseMs: number;
  multiplier: number;
  maxAttempts: number;
}

/** Local retry ladder for one delivery: three attempts, 200ms then 400ms apart. */
export const LOCAL_RETRY_POLICY: RetryPolicyConfig = {
  baseMs: 100,
  multiplier: 2,
  maxAttempts: 3,
};

const TERMINAL_CLIENT_STATUSES: ReadonlySet<number> = new Set([400, 401, 403, 404]);

export type ResponseClass = 'success' | ErrorClassification;

/**
 * Delay before the attempt with the given zero-based index. Returns null once
 * the index is past the last attempt.
 */
export function calculateBackoffDelay(
  attemptIndex: number,
  config: RetryPolicyConfig = LOCAL_RETRY_POLICY,
): number | null {
  if (attemptIndex >= config.maxAttempts) {
    return null;
  }

  const effectiveIndex = Math.max(0, attemptIndex);
  return Math.round(config.baseMs * Math.pow(config.multiplier, effectiveIndex));
}

export function classifyResponseStatus(status: number): ResponseClass {
  if (status >= 200 && status < 300) {
    return 'success';
  }

  if (TERMINAL_CLIENT_STATUSES.has(status)) {
    return 'permanent';
  }

  return 'transient';
}
