import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, UpdateQuery } from 'mongoose';
import { Product } from './schemas/product.schema';
import { Counter } from './schemas/counter.schema';
import {
  IProduct,
  ProductFields,
  ProductListQuery,
  ProductPatch,
} from './interface/product.interface';
import { pickPatch, ProductStore } from './product.store';
import {
  DuplicateSkuError,
  InsufficientStockError,
  ProductNotFoundError,
  VersionConflictError,
} from './errors/product.errors';

export const PRODUCT_SEQUENCE = 'products';
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

const DUPLICATE_KEY = 11000;

function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === DUPLICATE_KEY
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toProduct(doc: Product): IProduct {
  return {
    id: doc.id,
    sku: doc.sku,
    name: doc.name,
    description: doc.description,
    price: doc.price,
    quantity: doc.quantity,
    vatRate: doc.vatRate,
    unit: doc.unit,
    brand: doc.brand,
    category: doc.category,
    isActive: doc.isActive,
    version: doc.version,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

@Injectable()
export class ProductRepository extends ProductStore {
  constructor(
    @InjectModel(Product.name)
    private readonly productModel: Model<Product>,
    @InjectModel(Counter.name)
    private readonly counterModel: Model<Counter>,
  ) {
    super();
  }

  async get(id: number): Promise<IProduct> {
    const product = await this.productModel
      .findOne({ id })
      .lean<Product>()
      .exec();
    if (!product) {
      throw new ProductNotFoundError({ id });
    }
    return toProduct(product);
  }

  async getBySku(sku: string): Promise<IProduct | null> {
    const product = await this.productModel
      .findOne({ sku })
      .lean<Product>()
      .exec();
    return product ? toProduct(product) : null;
  }

  async list(query: ProductListQuery): Promise<IProduct[]> {
    const filter: FilterQuery<Product> = {};
    if (query.q) {
      filter.name = { $regex: escapeRegExp(query.q), $options: 'i' };
    }
    if (query.category) {
      filter.category = query.category;
    }
    if (query.brand) {
      filter.brand = query.brand;
    }
    if (query.minPrice !== undefined || query.maxPrice !== undefined) {
      filter.price = {
        ...(query.minPrice !== undefined ? { $gte: query.minPrice } : {}),
        ...(query.maxPrice !== undefined ? { $lte: query.maxPrice } : {}),
      };
    }
    if (query.onlyActive ?? true) {
      filter.isActive = true;
    }

    const direction = query.sortDir === 'desc' ? -1 : 1;
    const limit = Math.min(query.limit ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);

    const products = await this.productModel
      .find(filter)
      .sort({ [query.sortBy ?? 'id']: direction, id: direction })
      .skip(query.skip ?? 0)
      .limit(limit)
      .lean<Product[]>()
      .exec();
    return products.map(toProduct);
  }

  async create(fields: ProductFields): Promise<IProduct> {
    const id = await this.nextId();
    try {
      const created = await this.productModel.create({
        ...fields,
        id,
        version: 1,
      });
      return toProduct(created.toObject());
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateSkuError(fields.sku);
      }
      throw error;
    }
  }

  async update(
    id: number,
    patch: ProductPatch,
    expectedVersion?: number,
  ): Promise<IProduct> {
    const current = await this.get(id);

    if (expectedVersion !== undefined && current.version !== expectedVersion) {
      throw new VersionConflictError(id, expectedVersion, current.version);
    }

    const changes = pickPatch(patch);
    if (changes.quantity !== undefined && changes.quantity < 0) {
      throw new InsufficientStockError(
        id,
        current.quantity,
        current.quantity - changes.quantity,
      );
    }

    const update: UpdateQuery<Product> =
      Object.keys(changes).length > 0
        ? { $set: changes, $inc: { version: 1 } }
        : { $inc: { version: 1 } };

    let updated: Product | null;
    try {
      // Compare-and-swap on the version read above: a stale write matches
      // no document.
      updated = await this.productModel
        .findOneAndUpdate({ id, version: current.version }, update, {
          new: true,
          runValidators: true,
        })
        .lean<Product>()
        .exec();
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateSkuError(changes.sku ?? current.sku);
      }
      throw error;
    }

    if (!updated) {
      throw new VersionConflictError(id, current.version);
    }
    return toProduct(updated);
  }

  async delete(id: number): Promise<IProduct> {
    const deleted = await this.productModel
      .findOneAndDelete({ id })
      .lean<Product>()
      .exec();
    if (!deleted) {
      throw new ProductNotFoundError({ id });
    }
    return toProduct(deleted);
  }

  private async nextId(): Promise<number> {
    const counter = await this.counterModel
      .findOneAndUpdate(
        { _id: PRODUCT_SEQUENCE },
        { $inc: { seq: 1 } },
        { new: true, upsert: true },
      )
      .lean<Counter>()
      .exec();
    if (!counter) {
      throw new Error(`Sequence ${PRODUCT_SEQUENCE} could not be advanced`);
    }
    return counter.seq;
  }
}
