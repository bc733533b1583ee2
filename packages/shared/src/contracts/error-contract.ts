export type ErrorCode =
  | 'INVALID_PAYLOAD'
  | 'UNKNOWN_EVENT_TYPE'
  | 'INTAKE_UNAVAILABLE'
  | 'TRANSPORT_FAILURE'
  | 'RETRYABLE_STATUS'
  | 'TERMINAL_STATUS'
  | 'DELIVERY_CANCELLED'
  | 'DEAD_LETTER_PUBLISH_FAILED'
  | 'REDELIVERY_SCHEDULED'
  | 'UNKNOWN_ERROR';

export type ErrorClassification = 'transient' | 'permanent';

export interface AppError {
  code: ErrorCode;
  message: string;
  classification?: ErrorClassification;
  cause?: unknown;
  meta?: Record<string, unknown>;
}
