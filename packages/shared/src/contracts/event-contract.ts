import type { JsonObject } from '../json/json-value.js';

export interface NotificationEvent {
  id: string;
  type: string;
  timestamp?: string;
  data: JsonObject;
}

export type Disposition = 'acknowledge' | 'retry_later';

export interface QueueJobPayload {
  body: string;
  properties: Record<string, string>;
  publishedAt: string;
}
