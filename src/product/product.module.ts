import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ProductController } from './product.controller';
import { ProductService } from './product.service';
import { Product, ProductSchema } from './schemas/product.schema';
import { Counter, CounterSchema } from './schemas/counter.schema';
import { ProductRepository } from './product.repository';
import { ProductStore } from './product.store';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Product.name, schema: ProductSchema },
      { name: Counter.name, schema: CounterSchema },
    ]),
  ],
  controllers: [ProductController],
  providers: [
    ProductService,
    { provide: ProductStore, useClass: ProductRepository },
  ],
  exports: [ProductService],
})
export class ProductModule {}
