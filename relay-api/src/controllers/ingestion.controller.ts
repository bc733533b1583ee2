import { randomUUID } from 'node:crypto';

import type { NotificationEvent, QueuePublisher, RoutingRule } from '@event-relay/shared';
import type { FastifyReply, FastifyRequest } from 'fastify';

import { publishEvent } from '../services/publish-event.service.js';
import { validateIngestEvent, type IngestEvent } from '../validators/event.schema.js';

interface RuleLookup {
  resolve(eventType: string): Readonly<RoutingRule> | undefined;
}

interface IngestionAcceptedResponse {
  acknowledged: true;
  eventId: string;
  topic: string;
  traceId: string;
  receivedAt: string;
}

interface IngestionErrorResponse {
  acknowledged: false;
  errorCode: 'INVALID_PAYLOAD' | 'UNKNOWN_EVENT_TYPE' | 'INTAKE_UNAVAILABLE';
  message: string;
  traceId: string;
}

export interface IngestionControllerDependencies {
  publisher: QueuePublisher;
  routes: RuleLookup;
  generateId?: () => string;
  now?: () => Date;
}

function getTraceId(request: FastifyRequest): string {
  const requestIdHeader = request.headers['x-request-id'];

  if (typeof requestIdHeader === 'string' && requestIdHeader.trim().length > 0) {
    return requestIdHeader;
  }

  return request.id;
}

export function createIngestionController(dependencies: IngestionControllerDependencies) {
  const generateId = dependencies.generateId ?? randomUUID;
  const now = dependencies.now ?? (() => new Date());

  return async function ingestionController(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply> {
    const traceId = getTraceId(request);
    const receivedAt = now().toISOString();

    let body: IngestEvent;
    try {
      body = validateIngestEvent(request.body);
    } catch (error) {
      request.log.info({ err: error, traceId }, 'Rejected invalid event payload');

      return reply.status(400).send({
        acknowledged: false,
        errorCode: 'INVALID_PAYLOAD',
        message: 'Request payload failed validation',
        traceId,
      } satisfies IngestionErrorResponse);
    }

    const rule = dependencies.routes.resolve(body.type);
    if (!rule) {
      return reply.status(400).send({
        acknowledged: false,
        errorCode: 'UNKNOWN_EVENT_TYPE',
        message: `Unknown event type: ${body.type}`,
        traceId,
      } satisfies IngestionErrorResponse);
    }

    const event: NotificationEvent = {
      id: body.id ?? generateId(),
      type: body.type,
      timestamp: body.timestamp ?? receivedAt,
      data: body.data,
    };

    try {
      await publishEvent(dependencies.publisher, rule.queueName, event, traceId);
    } catch (error) {
      request.log.error(
        { err: error, traceId, eventId: event.id, topic: rule.queueName },
        'Failed to publish event',
      );

      return reply.status(503).send({
        acknowledged: false,
        errorCode: 'INTAKE_UNAVAILABLE',
        message: 'Event intake temporarily unavailable',
        traceId,
      } satisfies IngestionErrorResponse);
    }

    return reply.status(202).send({
      acknowledged: true,
      eventId: event.id,
      topic: rule.queueName,
      traceId,
      receivedAt,
    } satisfies IngestionAcceptedResponse);
  };
}
