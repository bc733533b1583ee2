import type {
  Disposition,
  QueueMessage,
  QueuePublisher,
  RoutingRule,
} from '@event-relay/shared';
import { withCorrelation } from '@event-relay/shared';
import type { Logger } from 'pino';

import { escalateToDeadLetter } from './dead-letter-escalator.js';
import { deliverNotification, type DeliveryOptions } from './deliver-notification.js';
import { classifyError } from './error-classifier.js';
import { decodeEvent } from './event-decoder.js';
import { renderTemplate } from './template-renderer.js';

interface RuleLookup {
  resolve(eventType: string): Readonly<RoutingRule> | undefined;
}

export interface ProcessMessageDeps {
  routes: RuleLookup;
  maxRetries: number;
  deadLetterPublisher: QueuePublisher;
  delivery?: DeliveryOptions;
  logger: Logger;
}

async function escalate(
  message: QueueMessage,
  deps: ProcessMessageDeps,
  logger: Logger,
): Promise<Disposition> {
  const result = await escalateToDeadLetter(message, deps.deadLetterPublisher);

  if (result.escalated) {
    logger.warn({ deadLetterTopic: result.topic }, 'Message moved to dead-letter');
    return 'acknowledge';
  }

  logger.error(
    { err: result.error, deadLetterTopic: result.topic, code: 'DEAD_LETTER_PUBLISH_FAILED' },
    'Dead-letter publish failed; message kept for redelivery',
  );
  return 'retry_later';
}

export async function processMessage(
  message: QueueMessage,
  deps: ProcessMessageDeps,
  signal?: AbortSignal,
): Promise<Disposition> {
  const logger = withCorrelation(deps.logger, {
    traceId: message.properties.traceId,
    messageId: message.id,
  });

  logger.info(
    { topic: message.topic, redeliveryCount: message.redeliveryCount },
    'Message received',
  );

  if (message.redeliveryCount >= deps.maxRetries) {
    logger.warn(
      { redeliveryCount: message.redeliveryCount, maxRetries: deps.maxRetries },
      'Message exceeded max redeliveries',
    );
    return escalate(message, deps, logger);
  }

  const decoded = decodeEvent(message.body);
  if (!decoded.ok) {
    logger.error(
      { code: 'INVALID_PAYLOAD', reason: decoded.reason },
      'Dropping message that cannot be decoded',
    );
    return 'acknowledge';
  }

  const event = decoded.event;
  const eventLogger = withCorrelation(logger, { eventId: event.id });

  const rule = deps.routes.resolve(event.type);
  if (!rule) {
    eventLogger.warn(
      { code: 'UNKNOWN_EVENT_TYPE', eventType: event.type },
      'No routing rule for event type; dropping message',
    );
    return 'acknowledge';
  }

  const renderedBody =
    rule.bodyTemplate === undefined ? undefined : renderTemplate(rule.bodyTemplate, event);

  const outcome = await deliverNotification(
    rule,
    renderedBody,
    event,
    { ...deps.delivery, logger: eventLogger },
    signal,
  );

  if (outcome.delivered) {
    return 'acknowledge';
  }

  const classified = classifyError(outcome.error);

  if (outcome.terminal) {
    eventLogger.error(
      {
        classification: classified.classification,
        code: classified.code,
        status: outcome.error.status,
        attempts: outcome.attempts,
      },
      'Endpoint rejected notification; escalating to dead-letter',
    );
    return escalate(message, deps, eventLogger);
  }

  eventLogger.warn(
    {
      classification: classified.classification,
      code: classified.code,
      attempts: outcome.attempts,
      reason: classified.message,
    },
    'Delivery failed; returning message for redelivery',
  );
  return 'retry_later';
}
