import { z } from 'zod';

const nodeEnvSchema = z.enum(['development', 'test', 'production']);

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const workerEnvSchema = z.object({
  SERVICE_NAME: z.string().trim().min(1).default('relay-worker'),
  NODE_ENV: nodeEnvSchema.default('development'),
  LOG_LEVEL: logLevelSchema.default('info'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  ROUTING_CONFIG_PATH: z.string().trim().min(1).default('config.json'),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(10),
  WORKER_DRAIN_TIMEOUT_MS: z.coerce.number().int().min(1).default(15000),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().min(1).default(10000),
  REDELIVERY_BACKOFF_MS: z.coerce.number().int().min(1).default(1000),
});

export type WorkerEnv = z.infer<typeof workerEnvSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'env';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function loadWorkerEnv(source: NodeJS.ProcessEnv = process.env): WorkerEnv {
  const parsed = workerEnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new Error(`Invalid relay-worker environment variables: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}
