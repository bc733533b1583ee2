import type { NotificationEvent, QueuePublisher } from '@event-relay/shared';

export async function publishEvent(
  publisher: QueuePublisher,
  topic: string,
  event: NotificationEvent,
  traceId: string,
): Promise<void> {
  await publisher.publish(topic, Buffer.from(JSON.stringify(event), 'utf8'), { traceId });
}
