import { setTimeout as sleepFor } from 'node:timers/promises';

import type { JsonValue, NotificationEvent, RoutingRule } from '@event-relay/shared';
import type { Logger } from 'pino';

import {
  calculateBackoffDelay,
  classifyResponseStatus,
  LOCAL_RETRY_POLICY,
  type RetryPolicyConfig,
} from '../queue/retry-policy.js';
import { DeliveryError } from './delivery-error.js';

export const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DeliveryOptions {
  fetch?: FetchFn;
  sleep?: SleepFn;
  timeoutMs?: number;
  retryPolicy?: RetryPolicyConfig;
}

export interface DeliverNotificationDeps extends DeliveryOptions {
  logger: Logger;
}

export type DeliveryOutcome =
  | { delivered: true; status: number; attempts: number }
  | { delivered: false; terminal: boolean; attempts: number; error: DeliveryError };

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }

  return String(error);
}

async function readResponseBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable response body: ${describeError(error)}>`;
  }
}

function encodeBody(rule: Pick<RoutingRule, 'method'>, renderedBody: JsonValue | undefined) {
  if (renderedBody === undefined || rule.method === 'GET') {
    return undefined;
  }

  // A Uint8Array body gets no default Content-Type from fetch.
  return new TextEncoder().encode(JSON.stringify(renderedBody));
}

function attemptSignal(timeoutMs: number, signal: AbortSignal | undefined): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

function cancelled(attempts: number, cause?: unknown): DeliveryOutcome {
  return {
    delivered: false,
    terminal: false,
    attempts,
    error: new DeliveryError('DELIVERY_CANCELLED', 'delivery cancelled before completion', {
      cause,
    }),
  };
}

/**
 * Sends the rendered body to the rule's endpoint, retrying transport failures
 * and retryable statuses with exponential backoff. Statuses 400, 401, 403 and
 * 404 end the ladder at once. When every attempt fails the last error is
 * returned.
 */
export async function deliverNotification(
  rule: Readonly<RoutingRule>,
  renderedBody: JsonValue | undefined,
  event: Pick<NotificationEvent, 'id'>,
  deps: DeliverNotificationDeps,
  signal?: AbortSignal,
): Promise<DeliveryOutcome> {
  const fetchFn: FetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
  const sleep = deps.sleep ?? defaultSleep;
  const policy = deps.retryPolicy ?? LOCAL_RETRY_POLICY;
  const timeoutMs = deps.timeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
  const body = encodeBody(rule, renderedBody);

  let lastError: DeliveryError | undefined;

  for (let attemptIndex = 0; attemptIndex < policy.maxAttempts; attemptIndex += 1) {
    const attempt = attemptIndex + 1;

    if (attemptIndex > 0) {
      const backoffMs = calculateBackoffDelay(attemptIndex, policy) ?? 0;
      deps.logger.info(
        { eventId: event.id, attempt, maxAttempts: policy.maxAttempts, backoffMs },
        'Retrying delivery after backoff',
      );

      try {
        await sleep(backoffMs, signal);
      } catch (error) {
        return cancelled(attemptIndex, error);
      }
    }

    if (signal?.aborted) {
      return cancelled(attemptIndex, signal.reason);
    }

    let response: Response;
    try {
      response = await fetchFn(rule.url, {
        method: rule.method,
        headers: { ...rule.headers },
        body,
        signal: attemptSignal(timeoutMs, signal),
      });
    } catch (error) {
      if (signal?.aborted) {
        return cancelled(attempt, error);
      }

      lastError = new DeliveryError(
        'TRANSPORT_FAILURE',
        `request network error: ${describeError(error)}`,
        { cause: error },
      );
      deps.logger.warn({ eventId: event.id, attempt, err: lastError }, 'Delivery attempt failed');
      continue;
    }

    const responseClass = classifyResponseStatus(response.status);
    const responseBody = await readResponseBody(response);

    if (responseClass === 'success') {
      deps.logger.info(
        { eventId: event.id, attempt, status: response.status, url: rule.url },
        'Notification delivered',
      );
      return { delivered: true, status: response.status, attempts: attempt };
    }

    if (responseClass === 'permanent') {
      return {
        delivered: false,
        terminal: true,
        attempts: attempt,
        error: new DeliveryError(
          'TERMINAL_STATUS',
          `request failed with client error status ${response.status}: ${responseBody}`,
          { status: response.status, responseBody },
        ),
      };
    }

    lastError = new DeliveryError(
      'RETRYABLE_STATUS',
      `request failed with status ${response.status}: ${responseBody}`,
      { status: response.status, responseBody },
    );
    deps.logger.warn(
      { eventId: event.id, attempt, status: response.status },
      'Delivery attempt failed',
    );
  }

  return {
    delivered: false,
    terminal: false,
    attempts: policy.maxAttempts,
    error:
      lastError ??
      new DeliveryError('TRANSPORT_FAILURE', 'no delivery attempt was made'),
  };
}
