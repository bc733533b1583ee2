import { z } from 'zod';

import type { QueueJobPayload } from '../contracts/event-contract.js';
import type { QueueMessage } from './queue-client.js';

const queueJobPayloadSchema = z.object({
  body: z.string(),
  properties: z.record(z.string(), z.string()).default({}),
  publishedAt: z.string(),
});

export function encodeJobPayload(
  body: Buffer,
  properties: Record<string, string>,
  now: Date = new Date(),
): QueueJobPayload {
  return {
    body: body.toString('base64'),
    properties: { ...properties },
    publishedAt: now.toISOString(),
  };
}

export interface JobLike {
  id?: string;
  name: string;
  data: unknown;
  attemptsMade: number;
}

/**
 * Maps a stored job back to the broker-neutral message shape. The body is
 * returned byte-for-byte as it was published.
 */
export function toQueueMessage(topic: string, job: JobLike): QueueMessage {
  const payload = queueJobPayloadSchema.parse(job.data);

  return {
    topic,
    id: job.id ?? job.name,
    body: Buffer.from(payload.body, 'base64'),
    redeliveryCount: Math.max(0, job.attemptsMade),
    properties: payload.properties,
  };
}
