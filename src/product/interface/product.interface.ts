export interface IProduct {
  readonly id: number;
  sku: string;
  name: string;
  description?: string;
  price: number;
  quantity: number;
  vatRate: number;
  unit?: string;
  brand?: string;
  category?: string;
  isActive: boolean;
  readonly version: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Fields a caller may supply when creating a product. */
export interface ProductFields {
  sku: string;
  name: string;
  description?: string;
  price: number;
  quantity: number;
  vatRate?: number;
  unit?: string;
  brand?: string;
  category?: string;
  isActive?: boolean;
}

export type ProductPatch = Partial<ProductFields>;

export const PRODUCT_SORT_FIELDS = [
  'id',
  'sku',
  'name',
  'price',
  'quantity',
  'createdAt',
  'updatedAt',
] as const;

export type ProductSortField = (typeof PRODUCT_SORT_FIELDS)[number];

export type SortDirection = 'asc' | 'desc';

export interface ProductListQuery {
  q?: string;
  category?: string;
  brand?: string;
  minPrice?: number;
  maxPrice?: number;
  onlyActive?: boolean;
  sortBy?: ProductSortField;
  sortDir?: SortDirection;
  skip?: number;
  limit?: number;
}
