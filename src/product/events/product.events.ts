import { IProduct } from '../interface/product.interface';

export enum ProductEventType {
  CREATED = 'product.created',
  UPDATED = 'product.updated',
  DELETED = 'product.deleted',
  ACTIVATED = 'product.activated',
  DEACTIVATED = 'product.deactivated',
}

export interface ProductChangedEvent {
  [key: string]: unknown;
  event: Exclude<ProductEventType, ProductEventType.DELETED>;
  id: number;
  sku: string;
  name: string;
  price: number;
  quantity: number;
  isActive: boolean;
  version: number;
}

export interface ProductDeletedEvent {
  [key: string]: unknown;
  event: ProductEventType.DELETED;
  id: number;
  sku: string;
}

export type ProductEvent = ProductChangedEvent | ProductDeletedEvent;

export function productChanged(
  event: ProductChangedEvent['event'],
  product: IProduct,
): ProductChangedEvent {
  return {
    event,
    id: product.id,
    sku: product.sku,
    name: product.name,
    price: product.price,
    quantity: product.quantity,
    isActive: product.isActive,
    version: product.version,
  };
}
