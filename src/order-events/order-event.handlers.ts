import { Injectable } from '@nestjs/common';
import { ProductService } from '../product/product.service';
import { decideStock } from '../product/stock-ledger';
import {
  InsufficientStockError,
  isStockRejection,
  ProductNotFoundError,
  VersionConflictError,
} from '../product/errors/product.errors';
import { ElasticsearchLoggerService } from '../logging/elasticsearch-logger.service';
import { errorMessage, errorTrace } from '../logging/error-trace';
import { MessagePayload, MessagePublisher } from '../rabbitmq/rabbitmq.types';
import {
  CleanedEntries,
  OrderEventPayload,
  OrderEventType,
  OrderReplyType,
  PricedLine,
  StockDelta,
  StockItem,
} from './order-events.types';
import {
  cleanDeltas,
  cleanItems,
  deltasPayload,
  itemsPayload,
  orderIdOf,
  roundToCents,
  totalsByProduct,
} from './order-payload';

const CONTEXT = 'OrderEventHandlers';
const REVERT_ATTEMPTS = 3;

/**
 * Keeps product stock in line with the order lifecycle. Reservations are
 * all-or-nothing: availability of every product is checked before the first
 * write, and a failure while writing reverts the adjustments already made.
 */
@Injectable()
export class OrderEventHandlers {
  constructor(
    private readonly productService: ProductService,
    private readonly publisher: MessagePublisher,
    private readonly logger: ElasticsearchLoggerService,
  ) {}

  async handleOrderCreated(payload: OrderEventPayload): Promise<void> {
    await this.reserveItems(OrderEventType.CREATED, payload);
  }

  async handleOrderReadyForStock(payload: OrderEventPayload): Promise<void> {
    await this.reserveItems(OrderEventType.READY_FOR_STOCK, payload);
  }

  async handleOrderItemsDelta(payload: OrderEventPayload): Promise<void> {
    const orderId = orderIdOf(payload);
    const deltas = this.accept(
      OrderEventType.ITEMS_DELTA,
      orderId,
      cleanDeltas(payload),
    );
    if (deltas.length === 0) {
      this.logger.log(
        `[${OrderEventType.ITEMS_DELTA}] order ${orderId} has no deltas, nothing to do`,
        CONTEXT,
      );
      return;
    }

    // Only additional reservations can run out of stock.
    const additional = totalsByProduct(
      deltas
        .filter(({ delta }) => delta > 0)
        .map(({ productId, delta }) => ({ productId, amount: delta })),
    );
    const rejection =
      (await this.findShortage(additional)) ??
      (await this.applyOrReject(
        deltas.map(({ productId, delta }) => ({ productId, delta: -delta })),
      ));

    if (rejection) {
      await this.reject(OrderEventType.ITEMS_DELTA, orderId, rejection, {
        deltas: deltasPayload(deltas),
      });
      return;
    }

    this.logger.log(
      `[${OrderEventType.ITEMS_DELTA}] order ${orderId}: applied ${deltas.length} deltas`,
      CONTEXT,
    );
  }

  async handleOrderCancelled(payload: OrderEventPayload): Promise<void> {
    await this.releaseItems(OrderEventType.CANCELLED, payload);
  }

  async handleOrderRejected(payload: OrderEventPayload): Promise<void> {
    // Nothing was reserved for a rejected order.
    this.logger.log(
      `[${OrderEventType.REJECTED}] order ${orderIdOf(payload)} rejected, stock untouched`,
      CONTEXT,
    );
  }

  async handleOrderDeleted(payload: OrderEventPayload): Promise<void> {
    const status =
      typeof payload.status === 'string' ? payload.status.toLowerCase() : '';
    if (status === 'rejected') {
      this.logger.log(
        `[${OrderEventType.DELETED}] order ${orderIdOf(payload)} was rejected, stock untouched`,
        CONTEXT,
      );
      return;
    }
    await this.releaseItems(OrderEventType.DELETED, payload);
  }

  async handleOrderUpdated(payload: OrderEventPayload): Promise<void> {
    const status = typeof payload.status === 'string' ? payload.status : 'n/a';
    this.logger.log(
      `[${OrderEventType.UPDATED}] order ${orderIdOf(payload)} status=${status}, stock untouched`,
      CONTEXT,
    );
  }

  async handleOrderRequestPrice(payload: OrderEventPayload): Promise<void> {
    const orderId = orderIdOf(payload);
    const customerId = payload.customer_id;
    const items = this.accept(
      OrderEventType.REQUEST_PRICE,
      orderId,
      cleanItems(payload),
    );

    if (customerId === undefined || customerId === null || customerId === '') {
      this.logger.warn(
        `[${OrderEventType.REQUEST_PRICE}] order ${orderId} has no customer_id, price not calculated`,
        CONTEXT,
      );
      return;
    }
    if (items.length === 0) {
      this.logger.warn(
        `[${OrderEventType.REQUEST_PRICE}] order ${orderId} has no items, price not calculated`,
        CONTEXT,
      );
      return;
    }

    const lines: PricedLine[] = [];
    let total = 0;
    for (const { productId, quantity } of items) {
      const product = await this.productService.get(productId);
      const lineTotal = product.price * quantity;
      total += lineTotal;
      lines.push({
        product_id: productId,
        quantity,
        unit_price: product.price,
        line_total: roundToCents(lineTotal),
      });
    }

    await this.publish(OrderReplyType.PRICE_CALCULATED, {
      event: OrderReplyType.PRICE_CALCULATED,
      order_id: orderId,
      customer_id: customerId,
      items: lines,
      total: roundToCents(total),
    });
  }

  private async reserveItems(
    eventType: OrderEventType,
    payload: OrderEventPayload,
  ): Promise<void> {
    const orderId = orderIdOf(payload);
    const items = this.accept(eventType, orderId, cleanItems(payload)).filter(
      ({ quantity }) => quantity > 0,
    );
    if (items.length === 0) {
      this.logger.log(
        `[${eventType}] order ${orderId} has no items, nothing to reserve`,
        CONTEXT,
      );
      return;
    }

    const requested = totalsByProduct(
      items.map(({ productId, quantity }) => ({ productId, amount: quantity })),
    );
    const rejection =
      (await this.findShortage(requested)) ??
      (await this.applyOrReject(
        items.map(({ productId, quantity }) => ({ productId, delta: -quantity })),
      ));

    if (rejection) {
      await this.reject(eventType, orderId, rejection, {
        items: itemsPayload(items),
      });
      return;
    }

    this.logger.log(
      `[${eventType}] order ${orderId}: stock reserved for ${items.length} items`,
      CONTEXT,
    );
    await this.publish(OrderReplyType.CONFIRMED, {
      event: OrderReplyType.CONFIRMED,
      order_id: orderId,
      items: itemsPayload(items),
    });
  }

  private async releaseItems(
    eventType: OrderEventType,
    payload: OrderEventPayload,
  ): Promise<void> {
    const orderId = orderIdOf(payload);
    const items = this.accept(eventType, orderId, cleanItems(payload)).filter(
      ({ quantity }) => quantity > 0,
    );
    if (items.length === 0) {
      this.logger.log(
        `[${eventType}] order ${orderId} has no items, nothing to release`,
        CONTEXT,
      );
      return;
    }

    await this.applyAll(
      items.map(({ productId, quantity }) => ({ productId, delta: quantity })),
    );
    this.logger.log(
      `[${eventType}] order ${orderId}: stock released for ${items.length} items`,
      CONTEXT,
    );
  }

  private accept<T>(
    eventType: OrderEventType,
    orderId: unknown,
    { accepted, dropped }: CleanedEntries<T>,
  ): T[] {
    for (const { entry, reason } of dropped) {
      this.logger.warn(
        `[${eventType}] order ${orderId}: ignored entry ${JSON.stringify(entry)} (${reason})`,
        CONTEXT,
      );
    }
    return accepted;
  }

  /** Dry run: the reason the first short product fails, if any. */
  private async findShortage(
    requested: Map<number, number>,
  ): Promise<string | undefined> {
    for (const [productId, amount] of requested) {
      try {
        const product = await this.productService.get(productId);
        const decision = decideStock(product.quantity, -amount);
        if (!decision.accepted) {
          return new InsufficientStockError(
            productId,
            decision.available,
            decision.requested,
          ).message;
        }
      } catch (error) {
        if (error instanceof ProductNotFoundError) {
          return error.message;
        }
        throw error;
      }
    }
    return undefined;
  }

  /**
   * Applies the adjustments; a stock rejection raised while writing (a
   * concurrent writer got there first) is returned as the rejection reason.
   */
  private async applyOrReject(
    adjustments: readonly StockDelta[],
  ): Promise<string | undefined> {
    try {
      await this.applyAll(adjustments);
      return undefined;
    } catch (error) {
      if (isStockRejection(error)) {
        return error.message;
      }
      throw error;
    }
  }

  /**
   * Applies adjustments in order. When one fails, the ones already applied
   * are reverted in reverse order before the error is re-thrown.
   */
  private async applyAll(adjustments: readonly StockDelta[]): Promise<void> {
    const applied: StockDelta[] = [];
    try {
      for (const adjustment of adjustments) {
        await this.productService.adjustStock(
          adjustment.productId,
          adjustment.delta,
        );
        applied.push(adjustment);
      }
    } catch (error) {
      await this.revert(applied);
      throw error;
    }
  }

  private async revert(applied: readonly StockDelta[]): Promise<void> {
    for (const { productId, delta } of [...applied].reverse()) {
      try {
        await this.adjustRetryingConflicts(productId, -delta);
      } catch (error) {
        this.logger.error(
          `Failed to revert stock adjustment ${delta} on product ${productId}: ${errorMessage(error)}`,
          errorTrace(error),
          CONTEXT,
        );
      }
    }
  }

  /**
   * A revert must land even when another writer touched the product since it
   * was reserved: each attempt re-reads the current version.
   */
  private async adjustRetryingConflicts(
    productId: number,
    delta: number,
  ): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        await this.productService.adjustStock(productId, delta);
        return;
      } catch (error) {
        if (
          !(error instanceof VersionConflictError) ||
          attempt >= REVERT_ATTEMPTS
        ) {
          throw error;
        }
        this.logger.warn(
          `Version conflict reverting product ${productId}, retrying (${attempt}/${REVERT_ATTEMPTS})`,
          CONTEXT,
        );
      }
    }
  }

  private async reject(
    eventType: OrderEventType,
    orderId: unknown,
    reason: string,
    entries: MessagePayload,
  ): Promise<void> {
    this.logger.warn(
      `[${eventType}] order ${orderId} rejected: ${reason}`,
      CONTEXT,
    );
    await this.publish(OrderReplyType.REJECTED, {
      event: OrderReplyType.REJECTED,
      order_id: orderId,
      reason,
      ...entries,
    });
  }

  private async publish(
    routingKey: OrderReplyType,
    payload: MessagePayload,
  ): Promise<void> {
    await this.publisher.publish(routingKey, payload);
  }
}
