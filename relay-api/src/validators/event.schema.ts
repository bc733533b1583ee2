import { jsonObjectSchema } from '@event-relay/shared';
import { z } from 'zod';

export const ingestEventSchema = z.object({
  id: z.string().trim().min(1).optional(),
  type: z.string().trim().min(1),
  timestamp: z.string().datetime({ offset: true }).optional(),
  data: jsonObjectSchema.default({}),
});

export type IngestEvent = z.infer<typeof ingestEventSchema>;

export function validateIngestEvent(input: unknown): IngestEvent {
  return ingestEventSchema.parse(input);
}
