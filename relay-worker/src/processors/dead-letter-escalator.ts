import type { QueueMessage, QueuePublisher } from '@event-relay/shared';

export const DEAD_LETTER_TOPIC_PREFIX = 'DLQ_';

export function deadLetterTopicFor(topic: string): string {
  return `${DEAD_LETTER_TOPIC_PREFIX}${topic}`;
}

export type EscalationResult =
  | { escalated: true; topic: string }
  | { escalated: false; topic: string; error: unknown };

/**
 * Republishes the message, body bytes and properties untouched, to
 * `DLQ_<source topic>`. A failed publish is returned, never thrown, so the
 * caller can keep the original message.
 */
export async function escalateToDeadLetter(
  message: QueueMessage,
  publisher: QueuePublisher,
): Promise<EscalationResult> {
  const topic = deadLetterTopicFor(message.topic);

  try {
    await publisher.publish(topic, message.body, { ...message.properties });
    return { escalated: true, topic };
  } catch (error) {
    return { escalated: false, topic, error };
  }
}
