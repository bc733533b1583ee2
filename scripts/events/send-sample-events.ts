import { createLogger, type JsonObject } from '@event-relay/shared';
import { z } from 'zod';

const envSchema = z.object({
  RELAY_API_URL: z.string().url().default('http://localhost:8080'),
});

interface SampleEvent {
  type: string;
  data: JsonObject;
}

const SAMPLE_EVENTS: SampleEvent[] = [
  {
    type: 'registration',
    data: {
      user_id: '12345',
      email: 'test@example.com',
      timestamp: '2023-10-27T10:00:00Z',
    },
  },
  {
    type: 'payment',
    data: {
      amount: 100,
      currency: 'USD',
      timestamp: '2023-10-27T10:05:00Z',
    },
  },
];

async function run(): Promise<void> {
  const env = envSchema.parse(process.env);
  const logger = createLogger({ serviceName: 'send-sample-events', level: 'info', pretty: true });
  const url = new URL('/events', env.RELAY_API_URL).toString();

  for (const event of SAMPLE_EVENTS) {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(event),
    });

    logger.info(
      { type: event.type, status: response.status, body: await response.text() },
      'Sample event sent',
    );
  }
}

run().catch((error: unknown) => {
  const logger = createLogger({ serviceName: 'send-sample-events', level: 'error', pretty: true });
  logger.error({ err: error }, 'Sending sample events failed');
  process.exitCode = 1;
});
