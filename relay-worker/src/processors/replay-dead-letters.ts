import type { QueueBrowser, QueuePublisher } from '@event-relay/shared';
import type { Logger } from 'pino';

import { deadLetterTopicFor } from './dead-letter-escalator.js';

export interface ReplayDeadLettersDeps {
  browser: QueueBrowser;
  publisher: QueuePublisher;
  logger: Logger;
}

export interface ReplayDeadLettersResult {
  sourceTopic: string;
  targetTopic: string;
  replayed: number;
}

export async function replayDeadLetters(
  topic: string,
  limit: number,
  deps: ReplayDeadLettersDeps,
): Promise<ReplayDeadLettersResult> {
  const sourceTopic = deadLetterTopicFor(topic);
  const pending = await deps.browser.peekWaiting(sourceTopic, limit);

  let replayed = 0;
  for (const message of pending) {
    await deps.publisher.publish(topic, message.body, message.properties);
    await message.remove();
    replayed += 1;

    deps.logger.debug({ messageId: message.id, sourceTopic, targetTopic: topic }, 'Replayed message');
  }

  deps.logger.info({ sourceTopic, targetTopic: topic, replayed }, 'Dead-letter replay completed');

  return { sourceTopic, targetTopic: topic, replayed };
}
