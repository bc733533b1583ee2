import Fastify from 'fastify';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';

import {
  BullMqQueueClient,
  createRedisConnection,
  loadRoutingConfig,
  RoutingTable,
} from '@event-relay/shared';

import { loadApiEnv } from './config/env.js';
import { registerHealthRoute } from './health/health.route.js';
import { registerIngestionRoutes } from './routes/ingestion.routes.js';

async function start(): Promise<void> {
  const env = loadApiEnv();

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      base: { service: env.SERVICE_NAME },
    },
  });

  const config = await loadRoutingConfig(env.ROUTING_CONFIG_PATH);
  const routes = new RoutingTable(config.notifications);
  app.log.info({ rules: routes.size }, 'Routing configuration loaded and validated');

  const redisConnection = createRedisConnection(env.REDIS_URL);

  const producer = new BullMqQueueClient({
    connection: redisConnection,
    logger: app.log,
    maxRedeliveries: config.mq.maxRetries,
    redeliveryBackoffMs: env.REDELIVERY_BACKOFF_MS,
  });

  await registerHealthRoute(app, {
    redis: redisConnection,
  });

  await registerIngestionRoutes(app, {
    publisher: producer,
    routes,
  });

  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    app.log.info('Shutdown signal received, stopping server...');

    await app.close();
    app.log.info('Server closed, closing producer...');
    await producer.shutdown();
    app.log.info('Producer closed, closing Redis...');
    await redisConnection.quit();
    app.log.info('All connections closed, exiting.');
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      app.log.error({ err: error }, 'API shutdown failed');
      process.exitCode = 1;
    });
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  await app.listen({
    host: '0.0.0.0',
    port: env.API_PORT,
  });
}

const isMain =
  typeof process.argv[1] === 'string' &&
  fileURLToPath(import.meta.url) === resolve(process.argv[1]);

if (isMain) {
  start().catch((error: unknown) => {
    process.exitCode = 1;
    throw error;
  });
}

export { start };
