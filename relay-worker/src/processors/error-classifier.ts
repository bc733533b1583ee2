import type { ErrorClassification, ErrorCode } from '@event-relay/shared';
import { RetryLaterError } from '@event-relay/shared';

import { DeliveryError } from './delivery-error.js';

export interface ClassifiedError {
  classification: ErrorClassification;
  code: ErrorCode;
  message: string;
}

interface ErrorLike {
  code?: string;
  name?: string;
  message?: string;
}

const TRANSPORT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

function asErrorLike(error: unknown): ErrorLike {
  if (typeof error === 'object' && error !== null) {
    const candidate: { code?: unknown; name?: unknown; message?: unknown } = error;

    return {
      code: typeof candidate.code === 'string' ? candidate.code : undefined,
      name: typeof candidate.name === 'string' ? candidate.name : undefined,
      message: typeof candidate.message === 'string' ? candidate.message : undefined,
    };
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return {};
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof DeliveryError) {
    return {
      classification: error.code === 'TERMINAL_STATUS' ? 'permanent' : 'transient',
      code: error.code,
      message: error.message,
    };
  }

  if (error instanceof RetryLaterError) {
    return {
      classification: 'transient',
      code: 'REDELIVERY_SCHEDULED',
      message: error.message,
    };
  }

  const parsed = asErrorLike(error);
  const message = parsed.message ?? 'Unknown error';

  if (
    (parsed.code !== undefined && TRANSPORT_ERROR_CODES.has(parsed.code)) ||
    (parsed.name ?? '').includes('Timeout')
  ) {
    return {
      classification: 'transient',
      code: 'TRANSPORT_FAILURE',
      message,
    };
  }

  if (parsed.name === 'ZodError' || parsed.name === 'SyntaxError') {
    return {
      classification: 'permanent',
      code: 'INVALID_PAYLOAD',
      message,
    };
  }

  return {
    classification: 'transient',
    code: 'UNKNOWN_ERROR',
    message,
  };
}
