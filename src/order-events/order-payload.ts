import {
  CleanedEntries,
  DroppedEntry,
  OrderEventPayload,
  StockDelta,
  StockItem,
} from './order-events.types';

const INTEGER_PATTERN = /^-?\d+$/;
const utf8 = new TextDecoder('utf-8', { fatal: true });

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts integers and integer-valued strings such as `"3"`. */
export function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Decodes a message body. Anything that is not a JSON object in valid UTF-8
 * is handed on as `{ raw }` so handlers still see the delivery.
 */
export function decodePayload(raw: Buffer): OrderEventPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(raw));
  } catch {
    return { raw };
  }
  return isRecord(parsed) ? parsed : { raw };
}

export function orderIdOf(payload: OrderEventPayload): unknown {
  return payload.order_id ?? payload.id ?? null;
}

function entriesOf(payload: OrderEventPayload, field: string): unknown[] {
  const raw = payload[field];
  return Array.isArray(raw) ? raw : [];
}

function productIdOf(entry: Record<string, unknown>): number | undefined {
  const productId = toInteger(entry.product_id);
  return productId !== undefined && productId > 0 ? productId : undefined;
}

export function cleanItems(payload: OrderEventPayload): CleanedEntries<StockItem> {
  const accepted: StockItem[] = [];
  const dropped: DroppedEntry[] = [];

  for (const entry of entriesOf(payload, 'items')) {
    if (!isRecord(entry)) {
      dropped.push({ entry, reason: 'not an object' });
      continue;
    }
    const productId = productIdOf(entry);
    const quantity = toInteger(entry.quantity);
    if (productId === undefined || quantity === undefined) {
      dropped.push({ entry, reason: 'invalid product_id or quantity' });
      continue;
    }
    if (quantity < 0) {
      dropped.push({ entry, reason: 'negative quantity' });
      continue;
    }
    accepted.push({ productId, quantity });
  }

  return { accepted, dropped };
}

export function cleanDeltas(payload: OrderEventPayload): CleanedEntries<StockDelta> {
  const accepted: StockDelta[] = [];
  const dropped: DroppedEntry[] = [];

  for (const entry of entriesOf(payload, 'deltas')) {
    if (!isRecord(entry)) {
      dropped.push({ entry, reason: 'not an object' });
      continue;
    }
    const productId = productIdOf(entry);
    const delta = toInteger(entry.delta);
    if (productId === undefined || delta === undefined) {
      dropped.push({ entry, reason: 'invalid product_id or delta' });
      continue;
    }
    if (delta === 0) {
      dropped.push({ entry, reason: 'zero delta' });
      continue;
    }
    accepted.push({ productId, delta });
  }

  return { accepted, dropped };
}

/** Sums amounts per product, keeping first-seen order. */
export function totalsByProduct(
  entries: readonly { productId: number; amount: number }[],
): Map<number, number> {
  const totals = new Map<number, number>();
  for (const { productId, amount } of entries) {
    totals.set(productId, (totals.get(productId) ?? 0) + amount);
  }
  return totals;
}

export function itemsPayload(items: readonly StockItem[]) {
  return items.map(({ productId, quantity }) => ({
    product_id: productId,
    quantity,
  }));
}

export function deltasPayload(deltas: readonly StockDelta[]) {
  return deltas.map(({ productId, delta }) => ({
    product_id: productId,
    delta,
  }));
}

export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}
