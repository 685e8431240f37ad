/** Routing keys of the order events this service reacts to. */
export enum OrderEventType {
  CREATED = 'order.created',
  READY_FOR_STOCK = 'order.ready_for_stock',
  ITEMS_DELTA = 'order.items_delta',
  CANCELLED = 'order.cancelled',
  REJECTED = 'order.rejected',
  DELETED = 'order.deleted',
  UPDATED = 'order.updated',
  REQUEST_PRICE = 'order.request_price',
}

/** Routing keys of the order events this service emits. */
export enum OrderReplyType {
  CONFIRMED = 'order.confirmed',
  REJECTED = 'order.rejected',
  PRICE_CALCULATED = 'order.price_calculated',
}

/** Decoded body of an inbound message; `{ raw }` when it was not a JSON object. */
export type OrderEventPayload = Record<string, unknown>;

export type OrderEventHandler = (payload: OrderEventPayload) => Promise<void>;

export interface StockItem {
  productId: number;
  quantity: number;
}

export interface StockDelta {
  productId: number;
  delta: number;
}

export interface DroppedEntry {
  entry: unknown;
  reason: string;
}

export interface CleanedEntries<T> {
  accepted: T[];
  dropped: DroppedEntry[];
}

export interface PricedLine {
  [key: string]: unknown;
  product_id: number;
  quantity: number;
  unit_price: number;
  line_total: number;
}
