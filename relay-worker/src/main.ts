import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';

import {
  BullMqQueueClient,
  createLogger,
  createRedisConnection,
  loadRoutingConfig,
  RoutingTable,
} from '@event-relay/shared';
import type { Logger } from 'pino';

import { loadWorkerEnv, type WorkerEnv } from './config/index.js';
import { checkWorkerHealth } from './health/health.js';
import { classifyError } from './processors/error-classifier.js';
import { createMessageHandler } from './queue/message-handler.js';

const HEALTH_INTERVAL_MS = 30_000;

async function closeWithTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;

  try {
    await Promise.race([
      promise.then(() => undefined),
      new Promise<void>((_, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Operation timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

async function start(env: WorkerEnv, logger: Logger): Promise<void> {
  const config = await loadRoutingConfig(env.ROUTING_CONFIG_PATH);
  const routes = new RoutingTable(config.notifications);

  logger.info(
    { rules: routes.size, maxRetries: config.mq.maxRetries },
    'Routing configuration loaded and validated',
  );

  const redisConnection = createRedisConnection(env.REDIS_URL);
  const dlqRedisConnection = createRedisConnection(env.REDIS_URL);

  const consumer = new BullMqQueueClient({
    connection: redisConnection,
    logger,
    concurrency: env.WORKER_CONCURRENCY,
    maxRedeliveries: config.mq.maxRetries,
    redeliveryBackoffMs: env.REDELIVERY_BACKOFF_MS,
  });

  const deadLetterProducer = new BullMqQueueClient({
    connection: dlqRedisConnection,
    logger,
    maxRedeliveries: config.mq.maxRetries,
  });

  const handler = createMessageHandler({
    routes,
    maxRetries: config.mq.maxRetries,
    deadLetterPublisher: deadLetterProducer,
    delivery: { timeoutMs: env.DELIVERY_TIMEOUT_MS },
    logger,
  });

  for (const topic of routes.topics()) {
    await consumer.subscribe(topic, handler);
    logger.info({ topic }, 'Subscribed to topic');
  }

  await consumer.start();
  logger.info('Relay worker started');

  const healthTimer = setInterval(() => {
    void checkWorkerHealth({ redis: redisConnection })
      .then((status) => {
        logger.info(status, 'Worker health status');
      })
      .catch((error: unknown) => {
        const classified = classifyError(error);
        logger.warn(
          { classification: classified.classification, code: classified.code },
          classified.message,
        );
      });
  }, HEALTH_INTERVAL_MS);

  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info('Shutdown signal received, stopping worker...');

    clearInterval(healthTimer);

    logger.info('Draining active messages...');
    await closeWithTimeout(consumer.shutdown(), env.WORKER_DRAIN_TIMEOUT_MS);

    logger.info('Consumer closed, closing dead-letter producer...');
    await deadLetterProducer.shutdown();

    logger.info('Producer closed, closing Redis...');
    await Promise.all([redisConnection.quit(), dlqRedisConnection.quit()]);

    logger.info('All connections closed, exiting.');
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Worker shutdown failed');
      process.exitCode = 1;
    });
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}

const isMain =
  typeof process.argv[1] === 'string' &&
  fileURLToPath(import.meta.url) === resolve(process.argv[1]);

function exitWithDiagnostic(logger: Logger, error: unknown): void {
  logger.fatal({ err: error }, 'Relay worker failed to start');
  logger.flush(() => {
    process.exit(1);
  });
}

if (isMain) {
  let env: WorkerEnv | undefined;
  try {
    env = loadWorkerEnv();
  } catch (error) {
    exitWithDiagnostic(createLogger({ serviceName: 'relay-worker', level: 'info' }), error);
  }

  if (env) {
    const logger = createLogger({
      serviceName: env.SERVICE_NAME,
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    });

    start(env, logger).catch((error: unknown) => {
      exitWithDiagnostic(logger, error);
    });
  }
}

export { start };
