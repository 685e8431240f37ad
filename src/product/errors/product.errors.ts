import { ConflictException, NotFoundException } from '@nestjs/common';

// Domain errors extend the HTTP exceptions so the controller layer needs no
// mapping; event handlers match on the concrete classes.

export class ProductNotFoundError extends NotFoundException {
  constructor(readonly lookup: { id: number } | { sku: string }) {
    super(
      'id' in lookup
        ? `Product ${lookup.id} not found`
        : `Product with SKU ${lookup.sku} not found`,
    );
    this.name = 'ProductNotFoundError';
  }
}

export class DuplicateSkuError extends ConflictException {
  constructor(readonly sku: string) {
    super(`SKU ${sku} already exists`);
    this.name = 'DuplicateSkuError';
  }
}

export class VersionConflictError extends ConflictException {
  constructor(
    readonly productId: number,
    readonly expectedVersion: number,
    readonly actualVersion?: number,
  ) {
    super(`Product ${productId} has been modified elsewhere`);
    this.name = 'VersionConflictError';
  }
}

export class InsufficientStockError extends ConflictException {
  constructor(
    readonly productId: number,
    readonly available: number,
    readonly requested: number,
  ) {
    super(
      `Insufficient stock for product ${productId}. Requested: ${requested}, Available: ${available}`,
    );
    this.name = 'InsufficientStockError';
  }
}

/** Errors that end a stock reservation with an `order.rejected` event. */
export type StockRejection =
  | ProductNotFoundError
  | VersionConflictError
  | InsufficientStockError;

export function isStockRejection(error: unknown): error is StockRejection {
  return (
    error instanceof ProductNotFoundError ||
    error instanceof VersionConflictError ||
    error instanceof InsufficientStockError
  );
}
