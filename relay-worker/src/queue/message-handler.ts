import type { Disposition, MessageHandler } from '@event-relay/shared';

import { classifyError } from '../processors/error-classifier.js';
import { processMessage, type ProcessMessageDeps } from '../processors/process-message.js';

/**
 * Resolves a delivered batch to one disposition. Messages run in order and the
 * first `retry_later` ends the batch; the rest wait for the redelivery.
 */
export function createMessageHandler(deps: ProcessMessageDeps): MessageHandler {
  return async (messages, signal): Promise<Disposition> => {
    for (const message of messages) {
      let disposition: Disposition;

      try {
        disposition = await processMessage(message, deps, signal);
      } catch (error) {
        const classified = classifyError(error);
        deps.logger.error(
          {
            err: error,
            messageId: message.id,
            topic: message.topic,
            classification: classified.classification,
            code: classified.code,
          },
          'Unexpected failure while handling message',
        );
        disposition = 'retry_later';
      }

      if (disposition === 'retry_later') {
        return 'retry_later';
      }
    }

    return 'acknowledge';
  };
}
