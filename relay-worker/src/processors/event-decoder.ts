import { jsonObjectSchema, type JsonObject, type NotificationEvent } from '@event-relay/shared';
import { z } from 'zod';

// Null decodes to the empty value. The type is kept as sent; rule lookup is exact.
export const notificationEventSchema = z.object({
  id: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  type: z.string(),
  timestamp: z
    .string()
    .datetime({ offset: true })
    .nullish()
    .transform((value) => value ?? undefined),
  data: jsonObjectSchema.nullish().transform((value): JsonObject => value ?? {}),
});

export type DecodeResult =
  | { ok: true; event: NotificationEvent }
  | { ok: false; reason: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'event';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function decodeEvent(body: Buffer): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(body.toString('utf8'));
  } catch (error) {
    return {
      ok: false,
      reason: `malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = notificationEventSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: `invalid event: ${formatIssues(parsed.error)}` };
  }

  const { timestamp, ...rest } = parsed.data;
  return { ok: true, event: timestamp === undefined ? rest : { ...rest, timestamp } };
}
