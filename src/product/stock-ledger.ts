export type StockDecision =
  | { accepted: true; quantity: number }
  | {
      accepted: false;
      reason: 'insufficient_stock';
      available: number;
      requested: number;
    };

/**
 * Decides whether applying `delta` to `current` keeps stock non-negative.
 * A negative delta consumes stock, a positive one replenishes it, zero is a
 * no-op that is always accepted.
 */
export function decideStock(current: number, delta: number): StockDecision {
  if (!Number.isInteger(current) || !Number.isInteger(delta)) {
    throw new TypeError(
      `Stock arithmetic requires integers (current=${current}, delta=${delta})`,
    );
  }

  const quantity = current + delta;
  if (quantity < 0) {
    return {
      accepted: false,
      reason: 'insufficient_stock',
      available: current,
      requested: -delta,
    };
  }
  return { accepted: true, quantity };
}
