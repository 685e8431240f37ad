import { MessagePayload, MessagePublisher } from '../rabbitmq.types';

export interface PublishedMessage {
  routingKey: string;
  payload: MessagePayload;
}

export class RecordingPublisher extends MessagePublisher {
  readonly published: PublishedMessage[] = [];

  async publish(routingKey: string, payload: MessagePayload): Promise<void> {
    this.published.push({ routingKey, payload });
  }

  routingKeys(): string[] {
    return this.published.map(({ routingKey }) => routingKey);
  }
}
