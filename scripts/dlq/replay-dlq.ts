import {
  BullMqQueueClient,
  createLogger,
  createRedisConnection,
  loadRoutingConfig,
} from '@event-relay/shared';
import { z } from 'zod';

import { replayDeadLetters } from '../../relay-worker/src/processors/replay-dead-letters.js';

const envSchema = z.object({
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  ROUTING_CONFIG_PATH: z.string().trim().min(1).default('config.json'),
});

interface ReplayArgs {
  topic: string;
  limit: number;
}

function parseArgs(argv: string[]): ReplayArgs {
  const topicIndex = argv.findIndex((arg) => arg === '--topic');
  const topic = topicIndex === -1 ? undefined : argv[topicIndex + 1];

  if (!topic || topic.startsWith('--')) {
    throw new Error('Usage: replay-dlq --topic <source-topic> [--limit <n>]');
  }

  const limitIndex = argv.findIndex((arg) => arg === '--limit');
  const parsed = Number.parseInt(limitIndex === -1 ? '' : (argv[limitIndex + 1] ?? ''), 10);

  return {
    topic,
    limit: Number.isFinite(parsed) && parsed > 0 ? parsed : 10,
  };
}

async function run(): Promise<void> {
  const env = envSchema.parse(process.env);
  const args = parseArgs(process.argv.slice(2));
  const logger = createLogger({
    serviceName: 'dlq-replay',
    level: 'info',
    pretty: true,
  });

  const config = await loadRoutingConfig(env.ROUTING_CONFIG_PATH);
  const redis = createRedisConnection(env.REDIS_URL);
  const client = new BullMqQueueClient({
    connection: redis,
    logger,
    maxRedeliveries: config.mq.maxRetries,
  });

  try {
    await replayDeadLetters(args.topic, args.limit, {
      browser: client,
      publisher: client,
      logger,
    });
  } finally {
    await client.shutdown();
    await redis.quit();
  }
}

run().catch((error: unknown) => {
  const logger = createLogger({
    serviceName: 'dlq-replay',
    level: 'error',
    pretty: true,
  });
  logger.error({ err: error }, 'DLQ replay failed');
  process.exitCode = 1;
});
