import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type ProductDocument = HydratedDocument<Product>;

// `id` is the integer surrogate key; Mongoose's string `id` virtual and
// `__v` key are turned off so that `version` is the only revision counter.
@Schema({
  collection: 'products',
  timestamps: true,
  versionKey: false,
  id: false,
})
export class Product {
  @Prop({ required: true, unique: true, immutable: true })
  id!: number;

  @Prop({ required: true, unique: true, minlength: 1, maxlength: 64 })
  sku!: string;

  @Prop({ required: true, minlength: 1, maxlength: 255 })
  name!: string;

  @Prop({ maxlength: 1000 })
  description?: string;

  @Prop({ required: true, min: 0 })
  price!: number;

  @Prop({
    required: true,
    min: 0,
    validate: { validator: Number.isInteger, message: 'quantity must be an integer' },
  })
  quantity!: number;

  @Prop({ default: 0, min: 0, max: 1 })
  vatRate!: number;

  @Prop({ maxlength: 32 })
  unit?: string;

  @Prop({ maxlength: 128 })
  brand?: string;

  @Prop({ maxlength: 128 })
  category?: string;

  @Prop({ default: true })
  isActive!: boolean;

  @Prop({ required: true, default: 1, min: 1 })
  version!: number;

  createdAt!: Date;

  updatedAt!: Date;
}

export const ProductSchema = SchemaFactory.createForClass(Product);

ProductSchema.index({ name: 1 });
ProductSchema.index({ category: 1, brand: 1 });
