import { RoutingTable } from '@event-relay/shared';
import { describe, expect, it, vi } from 'vitest';

import type { FetchFn } from '../../src/processors/deliver-notification.js';
import { processMessage, type ProcessMessageDeps } from '../../src/processors/process-message.js';
import { buildMessage, buildRule, noSleep, RecordingPublisher, silentLogger } from '../support/fakes.js';

function buildDeps(fetchMock: FetchFn, publisher: RecordingPublisher): ProcessMessageDeps {
  return {
    routes: new RoutingTable([buildRule()]),
    maxRetries: 16,
    deadLetterPublisher: publisher,
    delivery: { fetch: fetchMock, sleep: noSleep },
    logger: silentLogger,
  };
}

describe('dead-letter routing', () => {
  it('escalates a message redelivered as many times as the limit without delivering it', async () => {
    const fetchMock = vi.fn<FetchFn>(async () => new Response('ok', { status: 200 }));
    const publisher = new RecordingPublisher();
    const message = buildMessage({ redeliveryCount: 16 });

    const disposition = await processMessage(message, buildDeps(fetchMock, publisher));

    expect(disposition).toBe('acknowledge');
    expect(fetchMock).not.toHaveBeenCalled();
    expect(publisher.published).toHaveLength(1);
    expect(publisher.published[0]?.topic).toBe('DLQ_user_events');
    expect(publisher.published[0]?.body.equals(message.body)).toBe(true);
    expect(publisher.published[0]?.properties).toEqual({ traceId: 'trace_1' });
  });

  it('still delivers a message one redelivery below the limit', async () => {
    const fetchMock = vi.fn<FetchFn>(async () => new Response('ok', { status: 200 }));
    const publisher = new RecordingPublisher();

    const disposition = await processMessage(
      buildMessage({ redeliveryCount: 15 }),
      buildDeps(fetchMock, publisher),
    );

    expect(disposition).toBe('acknowledge');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(publisher.published).toHaveLength(0);
  });

  it('keeps the message for redelivery when the dead-letter publish fails', async () => {
    const fetchMock = vi.fn<FetchFn>(async () => new Response('ok', { status: 200 }));
    const publisher = new RecordingPublisher(new Error('redis down'));

    const disposition = await processMessage(
      buildMessage({ redeliveryCount: 20 }),
      buildDeps(fetchMock, publisher),
    );

    expect(disposition).toBe('retry_later');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('escalates a terminal endpoint rejection straight to the dead-letter topic', async () => {
    const fetchMock = vi.fn<FetchFn>(async () => new Response('no such user', { status: 404 }));
    const publisher = new RecordingPublisher();
    const message = buildMessage();

    const disposition = await processMessage(message, buildDeps(fetchMock, publisher));

    expect(disposition).toBe('acknowledge');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(publisher.published.map((entry) => entry.topic)).toEqual(['DLQ_user_events']);
    expect(publisher.published[0]?.body.equals(message.body)).toBe(true);
  });

  it('returns a terminal rejection for redelivery when the dead-letter publish fails', async () => {
    const fetchMock = vi.fn<FetchFn>(async () => new Response('forbidden', { status: 403 }));
    const publisher = new RecordingPublisher(new Error('redis down'));

    const disposition = await processMessage(buildMessage(), buildDeps(fetchMock, publisher));

    expect(disposition).toBe('retry_later');
  });

  it('does not escalate when local retries are exhausted below the limit', async () => {
    const fetchMock = vi.fn<FetchFn>(async () => new Response('busy', { status: 503 }));
    const publisher = new RecordingPublisher();

    const disposition = await processMessage(
      buildMessage({ redeliveryCount: 3 }),
      buildDeps(fetchMock, publisher),
    );

    expect(disposition).toBe('retry_later');
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(publisher.published).toHaveLength(0);
  });
});
