import type { Disposition } from '../contracts/event-contract.js';

export interface QueueMessage {
  topic: string;
  id: string;
  body: Buffer;
  redeliveryCount: number;
  properties: Record<string, string>;
}

/**
 * Receives the messages of one delivery. The signal fires when the client is
 * shutting down so long-running work can stop early.
 */
export type MessageHandler = (
  messages: readonly QueueMessage[],
  signal: AbortSignal,
) => Promise<Disposition>;

export interface QueuePublisher {
  publish(topic: string, body: Buffer, properties: Record<string, string>): Promise<void>;
}

export interface QueueClient extends QueuePublisher {
  subscribe(topic: string, handler: MessageHandler): Promise<void>;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface PendingMessage extends QueueMessage {
  remove(): Promise<void>;
}

/** Read access to messages that are stored but not yet consumed. */
export interface QueueBrowser {
  peekWaiting(topic: string, limit: number): Promise<PendingMessage[]>;
}

export class RetryLaterError extends Error {
  public constructor(
    message: string,
    public readonly messageId: string,
  ) {
    super(message);
    this.name = 'RetryLaterError';
  }
}
