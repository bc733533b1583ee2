export type { Disposition, NotificationEvent, QueueJobPayload } from './contracts/event-contract.js';
export type { AppError, ErrorClassification, ErrorCode } from './contracts/error-contract.js';
export {
  DEFAULT_MAX_RETRIES,
  HTTP_METHODS,
  loadRoutingConfig,
  parseRoutingConfig,
  routingConfigSchema,
} from './config/routing-config.js';
export type { HttpMethod, MqConfig, RoutingConfig, RoutingRule } from './config/routing-config.js';
export { isJsonObject, jsonObjectSchema, jsonValueSchema } from './json/json-value.js';
export type { JsonObject, JsonPrimitive, JsonValue } from './json/json-value.js';
export { createLogger, withCorrelation } from './logging/logger.js';
export type { CorrelationFields, CreateLoggerOptions } from './logging/logger.js';
export { BullMqQueueClient } from './queue/bullmq-queue-client.js';
export type { BullMqQueueClientOptions } from './queue/bullmq-queue-client.js';
export { encodeJobPayload, toQueueMessage } from './queue/job-payload.js';
export type { JobLike } from './queue/job-payload.js';
export { RetryLaterError } from './queue/queue-client.js';
export type {
  MessageHandler,
  PendingMessage,
  QueueBrowser,
  QueueClient,
  QueueMessage,
  QueuePublisher,
} from './queue/queue-client.js';
export { createRedisConnection, parseRedisOptions, pingRedis } from './queue/redis.js';
export type { RedisHealthClient } from './queue/redis.js';
export { RoutingTable } from './routing/routing-table.js';
