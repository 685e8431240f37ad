import {
  IProduct,
  ProductFields,
  ProductListQuery,
  ProductPatch,
} from './interface/product.interface';

/**
 * Persistence contract for products. Also the injection token: the module
 * binds it to the Mongoose repository, tests bind an in-memory fake.
 */
export abstract class ProductStore {
  /** @throws ProductNotFoundError */
  abstract get(id: number): Promise<IProduct>;

  abstract getBySku(sku: string): Promise<IProduct | null>;

  abstract list(query: ProductListQuery): Promise<IProduct[]>;

  /** @throws DuplicateSkuError */
  abstract create(fields: ProductFields): Promise<IProduct>;

  /**
   * Applies the supplied fields and advances `version` by one. The write is
   * conditioned on the version read beforehand, so a concurrent writer makes
   * it fail with VersionConflictError instead of being overwritten.
   *
   * @throws ProductNotFoundError, VersionConflictError, DuplicateSkuError,
   * InsufficientStockError (negative quantity)
   */
  abstract update(
    id: number,
    patch: ProductPatch,
    expectedVersion?: number,
  ): Promise<IProduct>;

  /** @throws ProductNotFoundError */
  abstract delete(id: number): Promise<IProduct>;
}

const PATCHABLE_FIELDS = [
  'sku',
  'name',
  'description',
  'price',
  'quantity',
  'vatRate',
  'unit',
  'brand',
  'category',
  'isActive',
] as const satisfies readonly (keyof ProductFields)[];

function copyField<K extends keyof ProductPatch>(
  target: ProductPatch,
  source: ProductPatch,
  key: K,
): void {
  target[key] = source[key];
}

/** Keeps only the writable fields the caller actually supplied. */
export function pickPatch(patch: ProductPatch): ProductPatch {
  const changes: ProductPatch = {};
  for (const field of PATCHABLE_FIELDS) {
    if (patch[field] !== undefined) {
      copyField(changes, patch, field);
    }
  }
  return changes;
}
