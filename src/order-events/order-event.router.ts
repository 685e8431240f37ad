import { Injectable } from '@nestjs/common';
import { ElasticsearchLoggerService } from '../logging/elasticsearch-logger.service';
import { errorMessage, errorTrace } from '../logging/error-trace';
import { OrderEventHandlers } from './order-event.handlers';
import { OrderEventHandler, OrderEventType } from './order-events.types';
import { decodePayload } from './order-payload';

const CONTEXT = 'OrderEventRouter';

@Injectable()
export class OrderEventRouter {
  private readonly routes: ReadonlyMap<string, OrderEventHandler>;

  constructor(
    handlers: OrderEventHandlers,
    private readonly logger: ElasticsearchLoggerService,
  ) {
    this.routes = new Map<string, OrderEventHandler>([
      [OrderEventType.CREATED, (p) => handlers.handleOrderCreated(p)],
      [OrderEventType.READY_FOR_STOCK, (p) => handlers.handleOrderReadyForStock(p)],
      [OrderEventType.ITEMS_DELTA, (p) => handlers.handleOrderItemsDelta(p)],
      [OrderEventType.CANCELLED, (p) => handlers.handleOrderCancelled(p)],
      [OrderEventType.REJECTED, (p) => handlers.handleOrderRejected(p)],
      [OrderEventType.DELETED, (p) => handlers.handleOrderDeleted(p)],
      [OrderEventType.UPDATED, (p) => handlers.handleOrderUpdated(p)],
      [OrderEventType.REQUEST_PRICE, (p) => handlers.handleOrderRequestPrice(p)],
    ]);
  }

  /**
   * Dispatches one delivery by exact routing key. Unknown keys are logged
   * and dropped; handler errors are logged and re-thrown so the consumer
   * nacks the message.
   */
  async route(routingKey: string, raw: Buffer): Promise<void> {
    const handler = this.routes.get(routingKey);
    if (!handler) {
      this.logger.warn(`No handler for routing key ${routingKey}, dropped`, CONTEXT);
      return;
    }

    const payload = decodePayload(raw);
    if (payload.raw === raw) {
      this.logger.warn(`Undecodable payload for ${routingKey}`, CONTEXT);
    }

    try {
      await handler(payload);
    } catch (error) {
      this.logger.error(
        `Handler for ${routingKey} failed: ${errorMessage(error)}`,
        errorTrace(error),
        CONTEXT,
      );
      throw error;
    }
  }
}
