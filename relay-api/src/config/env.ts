import { z } from 'zod';

const nodeEnvSchema = z.enum(['development', 'test', 'production']);

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const apiEnvSchema = z.object({
  SERVICE_NAME: z.string().trim().min(1).default('relay-api'),
  NODE_ENV: nodeEnvSchema.default('development'),
  LOG_LEVEL: logLevelSchema.default('info'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  ROUTING_CONFIG_PATH: z.string().trim().min(1).default('config.json'),
  REDELIVERY_BACKOFF_MS: z.coerce.number().int().min(1).default(1000),
});

export type ApiEnv = z.infer<typeof apiEnvSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'env';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function loadApiEnv(source: NodeJS.ProcessEnv = process.env): ApiEnv {
  const parsed = apiEnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new Error(`Invalid relay-api environment variables: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}
