export type MessagePayload = Record<string, unknown>;

/** Outbound side of the broker; services depend on this, never on amqplib. */
export abstract class MessagePublisher {
  abstract publish(routingKey: string, payload: MessagePayload): Promise<void>;
}

export type MessageHandler = (
  routingKey: string,
  content: Buffer,
) => Promise<void>;

export interface ConsumeOptions {
  prefetch: number;
  requeueOnError: boolean;
}

export interface ConsumerRegistration {
  queue: string;
  patterns: readonly string[];
  handler: MessageHandler;
  options: ConsumeOptions;
}

export enum RabbitMQExchangeType {
  TOPIC = 'topic',
}

export const ORDER_BINDING_PATTERNS = ['order.#', 'customer.#'] as const;
