import { Injectable } from '@nestjs/common';
import { ProductStore } from './product.store';
import {
  IProduct,
  ProductFields,
  ProductListQuery,
  ProductPatch,
} from './interface/product.interface';
import {
  DuplicateSkuError,
  InsufficientStockError,
  ProductNotFoundError,
} from './errors/product.errors';
import { decideStock } from './stock-ledger';
import {
  ProductEvent,
  ProductEventType,
  productChanged,
} from './events/product.events';
import { ElasticsearchLoggerService } from '../logging/elasticsearch-logger.service';
import { errorMessage, errorTrace } from '../logging/error-trace';
import { MessagePublisher } from '../rabbitmq/rabbitmq.types';

const CONTEXT = 'ProductService';

@Injectable()
export class ProductService {
  constructor(
    private readonly productStore: ProductStore,
    private readonly logger: ElasticsearchLoggerService,
    private readonly publisher: MessagePublisher,
  ) {}

  async get(id: number): Promise<IProduct> {
    return this.productStore.get(id);
  }

  async findBySku(sku: string): Promise<IProduct | null> {
    return this.productStore.getBySku(sku);
  }

  async getBySku(sku: string): Promise<IProduct> {
    const product = await this.productStore.getBySku(sku);
    if (!product) {
      throw new ProductNotFoundError({ sku });
    }
    return product;
  }

  async list(query: ProductListQuery): Promise<IProduct[]> {
    const products = await this.productStore.list(query);
    this.logger.debug(`Listed ${products.length} products`, CONTEXT);
    return products;
  }

  async create(data: ProductFields): Promise<IProduct> {
    const existing = await this.productStore.getBySku(data.sku);
    if (existing) {
      throw new DuplicateSkuError(data.sku);
    }

    const product = await this.productStore.create(data);
    await this.publishEvent(productChanged(ProductEventType.CREATED, product));
    this.logger.log(`Product ${product.id} created (${product.sku})`, CONTEXT);
    return product;
  }

  async update(
    id: number,
    patch: ProductPatch,
    expectedVersion?: number,
  ): Promise<IProduct> {
    const product = await this.productStore.update(id, patch, expectedVersion);
    await this.publishEvent(productChanged(ProductEventType.UPDATED, product));
    this.logger.log(
      `Product ${product.id} updated to version ${product.version}`,
      CONTEXT,
    );
    return product;
  }

  async delete(id: number): Promise<IProduct> {
    const product = await this.productStore.delete(id);
    await this.publishEvent({
      event: ProductEventType.DELETED,
      id: product.id,
      sku: product.sku,
    });
    this.logger.log(`Product ${product.id} deleted (${product.sku})`, CONTEXT);
    return product;
  }

  /**
   * Applies a signed delta to the stock of one product. The write is
   * conditioned on the version that was read, so a concurrent change between
   * the read and the write surfaces as VersionConflictError.
   */
  async adjustStock(id: number, delta: number): Promise<IProduct> {
    const product = await this.productStore.get(id);
    const decision = decideStock(product.quantity, delta);

    if (!decision.accepted) {
      this.logger.debug(
        `Stock adjustment refused for product ${id}: quantity ${product.quantity}, delta ${delta}`,
        CONTEXT,
      );
      throw new InsufficientStockError(
        id,
        decision.available,
        decision.requested,
      );
    }

    if (delta === 0) {
      return product;
    }

    this.logger.debug(
      `Adjusting stock for product ${id}: ${product.quantity} -> ${decision.quantity}`,
      CONTEXT,
    );
    return this.update(id, { quantity: decision.quantity }, product.version);
  }

  async setActive(id: number, isActive: boolean): Promise<IProduct> {
    const product = await this.update(id, { isActive });
    await this.publishEvent(
      productChanged(
        isActive ? ProductEventType.ACTIVATED : ProductEventType.DEACTIVATED,
        product,
      ),
    );
    return product;
  }

  async upsertBySku(data: ProductFields): Promise<IProduct> {
    const existing = await this.productStore.getBySku(data.sku);
    if (!existing) {
      return this.create(data);
    }
    return this.update(existing.id, data);
  }

  private async publishEvent(event: ProductEvent): Promise<void> {
    try {
      await this.publisher.publish(event.event, event);
    } catch (error) {
      this.logger.error(
        `Failed to publish ${event.event} for product ${event.id}: ${errorMessage(error)}`,
        errorTrace(error),
        CONTEXT,
      );
      throw error;
    }
  }
}
