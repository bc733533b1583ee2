import type { ErrorCode } from '@event-relay/shared';

export type DeliveryErrorCode = Extract<
  ErrorCode,
  'TRANSPORT_FAILURE' | 'RETRYABLE_STATUS' | 'TERMINAL_STATUS' | 'DELIVERY_CANCELLED'
>;

export interface DeliveryErrorDetails {
  status?: number;
  responseBody?: string;
  cause?: unknown;
}

export class DeliveryError extends Error {
  public readonly status?: number;
  public readonly responseBody?: string;

  public constructor(
    public readonly code: DeliveryErrorCode,
    message: string,
    details: DeliveryErrorDetails = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'DeliveryError';
    this.status = details.status;
    this.responseBody = details.responseBody;
  }
}
