import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { jsonValueSchema, type JsonValue } from '../json/json-value.js';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const DEFAULT_MAX_RETRIES = 16;

export interface RoutingRule {
  eventType: string;
  queueName: string;
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  bodyTemplate?: JsonValue;
}

export interface MqConfig {
  maxRetries: number;
}

export interface RoutingConfig {
  mq: MqConfig;
  notifications: RoutingRule[];
}

const httpMethodSchema = z
  .string()
  .trim()
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(HTTP_METHODS));

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const absoluteUrlSchema = z.string().trim().refine(isAbsoluteHttpUrl, {
  message: 'must be an absolute http(s) URL',
});

const notificationSchema = z
  .object({
    event_type: z.string().trim().min(1),
    queue_name: z.string().trim().min(1),
    http_method: httpMethodSchema,
    http_url: absoluteUrlSchema,
    headers: z.record(z.string(), z.string()).default({}),
    body: jsonValueSchema.optional(),
  })
  .transform(
    (raw): RoutingRule => ({
      eventType: raw.event_type,
      queueName: raw.queue_name,
      method: raw.http_method,
      url: raw.http_url,
      headers: raw.headers,
      ...(raw.body === undefined ? {} : { bodyTemplate: raw.body }),
    }),
  );

export const routingConfigSchema = z
  .object({
    mq: z
      .object({
        max_retries: z.number().int().min(0).optional(),
      })
      .default({}),
    notifications: z.array(notificationSchema).min(1, 'no notifications configured'),
  })
  .transform((raw, ctx): RoutingConfig => {
    const seen = new Set<string>();

    raw.notifications.forEach((rule, index) => {
      if (seen.has(rule.eventType)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['notifications', index, 'event_type'],
          message: `duplicate rule for event type '${rule.eventType}'`,
        });
      }
      seen.add(rule.eventType);
    });

    return {
      mq: {
        // 0 and unset both mean the broker default.
        maxRetries: raw.mq.max_retries || DEFAULT_MAX_RETRIES,
      },
      notifications: raw.notifications,
    };
  });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function parseRoutingConfig(input: unknown): RoutingConfig {
  const parsed = routingConfigSchema.safeParse(input);

  if (!parsed.success) {
    throw new Error(`Invalid routing configuration: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}

export async function loadRoutingConfig(path: string): Promise<RoutingConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new Error(`Failed to read routing configuration from ${path}.`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Routing configuration at ${path} is not valid JSON.`, { cause: error });
  }

  return parseRoutingConfig(json);
}
