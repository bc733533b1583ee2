import { type Job, type Processor, Queue, Worker } from 'bullmq';
import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

import type { QueueJobPayload } from '../contracts/event-contract.js';
import { DEFAULT_MAX_RETRIES } from '../config/routing-config.js';
import { encodeJobPayload, toQueueMessage } from './job-payload.js';
import {
  type MessageHandler,
  type PendingMessage,
  type QueueBrowser,
  type QueueClient,
  type QueueMessage,
  RetryLaterError,
} from './queue-client.js';

const JOB_NAME = 'event';
const DEFAULT_CONCURRENCY = 10;
const DEFAULT_REDELIVERY_BACKOFF_MS = 1000;
// Attempts beyond maxRedeliveries so a failed dead-letter publish is retried
// before BullMQ gives up on the job.
const ESCALATION_RETRY_ATTEMPTS = 3;

export interface BullMqQueueClientOptions {
  connection: Redis;
  logger: Pick<Logger, 'error' | 'debug'>;
  concurrency?: number;
  maxRedeliveries?: number;
  redeliveryBackoffMs?: number;
}

export class BullMqQueueClient implements QueueClient, QueueBrowser {
  private readonly queues = new Map<string, Queue<QueueJobPayload>>();
  private readonly handlers = new Map<string, MessageHandler>();
  private readonly workers: Worker<QueueJobPayload>[] = [];
  private readonly abortController = new AbortController();
  private started = false;

  public constructor(private readonly options: BullMqQueueClientOptions) {}

  public async subscribe(topic: string, handler: MessageHandler): Promise<void> {
    if (this.started) {
      throw new Error(`Cannot subscribe to ${topic}: queue client already started`);
    }

    if (this.handlers.has(topic)) {
      throw new Error(`Topic ${topic} already has a subscriber`);
    }

    this.handlers.set(topic, handler);
  }

  public async start(): Promise<void> {
    if (this.started) {
      throw new Error('Queue client already started');
    }

    this.started = true;

    for (const [topic, handler] of this.handlers) {
      const worker = new Worker<QueueJobPayload>(topic, this.createProcessor(topic, handler), {
        connection: this.options.connection,
        concurrency: this.options.concurrency ?? DEFAULT_CONCURRENCY,
      });

      worker.on('error', (error) => {
        this.options.logger.error({ err: error, topic }, 'Queue worker error');
      });

      worker.on('failed', (job, error) => {
        if (error instanceof RetryLaterError) {
          this.options.logger.debug(
            { topic, jobId: job?.id, attemptsMade: job?.attemptsMade, code: 'REDELIVERY_SCHEDULED' },
            'Message scheduled for redelivery',
          );
          return;
        }

        this.options.logger.error({ err: error, topic, jobId: job?.id }, 'Queue job failed');
      });

      this.workers.push(worker);
    }
  }

  public async publish(
    topic: string,
    body: Buffer,
    properties: Record<string, string>,
  ): Promise<void> {
    const maxRedeliveries = this.options.maxRedeliveries ?? DEFAULT_MAX_RETRIES;

    await this.queueFor(topic).add(JOB_NAME, encodeJobPayload(body, properties), {
      attempts: maxRedeliveries + 1 + ESCALATION_RETRY_ATTEMPTS,
      backoff: {
        type: 'exponential',
        delay: this.options.redeliveryBackoffMs ?? DEFAULT_REDELIVERY_BACKOFF_MS,
      },
      removeOnComplete: true,
      removeOnFail: false,
    });
  }

  public async peekWaiting(topic: string, limit: number): Promise<PendingMessage[]> {
    if (limit <= 0) {
      return [];
    }

    const jobs = await this.queueFor(topic).getWaiting(0, limit - 1);

    return jobs.map((job) => ({
      ...toQueueMessage(topic, job),
      remove: () => job.remove(),
    }));
  }

  public async shutdown(): Promise<void> {
    this.abortController.abort();

    await Promise.all(this.workers.map((worker) => worker.close()));
    this.workers.length = 0;

    await Promise.all([...this.queues.values()].map((queue) => queue.close()));
    this.queues.clear();
  }

  private queueFor(topic: string): Queue<QueueJobPayload> {
    const existing = this.queues.get(topic);
    if (existing) {
      return existing;
    }

    const queue = new Queue<QueueJobPayload>(topic, { connection: this.options.connection });
    this.queues.set(topic, queue);
    return queue;
  }

  private createProcessor(topic: string, handler: MessageHandler): Processor<QueueJobPayload> {
    return async (job: Job<QueueJobPayload>): Promise<void> => {
      let message: QueueMessage;
      try {
        message = toQueueMessage(topic, job);
      } catch (error) {
        // Foreign envelopes never decode, so the job is completed, not redelivered.
        this.options.logger.error(
          { err: error, topic, jobId: job.id },
          'Dropping job with unreadable envelope',
        );
        return;
      }

      const disposition = await handler([message], this.abortController.signal);

      if (disposition === 'retry_later') {
        throw new RetryLaterError(
          `Message ${message.id} on ${topic} returned for redelivery`,
          message.id,
        );
      }
    };
  }
}
