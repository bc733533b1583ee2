import { describe, expect, it } from 'vitest';

import {
  deadLetterTopicFor,
  escalateToDeadLetter,
} from '../../src/processors/dead-letter-escalator.js';
import { buildMessage, RecordingPublisher } from '../support/fakes.js';

describe('dead-letter escalator', () => {
  it('prefixes the source topic with DLQ_', () => {
    expect(deadLetterTopicFor('user_events')).toBe('DLQ_user_events');
  });

  it('republishes the original body and properties', async () => {
    const publisher = new RecordingPublisher();
    const message = buildMessage({ body: Buffer.from('raw bytes'), properties: { traceId: 't1' } });

    const result = await escalateToDeadLetter(message, publisher);

    expect(result).toEqual({ escalated: true, topic: 'DLQ_user_events' });
    expect(publisher.published).toHaveLength(1);
    expect(publisher.published[0]?.topic).toBe('DLQ_user_events');
    expect(publisher.published[0]?.body.toString('utf8')).toBe('raw bytes');
    expect(publisher.published[0]?.properties).toEqual({ traceId: 't1' });
    expect(publisher.published[0]?.properties).not.toBe(message.properties);
  });

  it('returns a failed publish instead of throwing', async () => {
    const failure = new Error('redis down');
    const publisher = new RecordingPublisher(failure);

    const result = await escalateToDeadLetter(buildMessage(), publisher);

    expect(result).toEqual({ escalated: false, topic: 'DLQ_user_events', error: failure });
  });
});
