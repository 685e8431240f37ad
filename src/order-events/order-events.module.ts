import { Module } from '@nestjs/common';
import { ProductModule } from '../product/product.module';
import { OrderEventHandlers } from './order-event.handlers';
import { OrderEventRouter } from './order-event.router';
import { OrderEventsConsumer } from './order-events.consumer';

@Module({
  imports: [ProductModule],
  providers: [OrderEventHandlers, OrderEventRouter, OrderEventsConsumer],
})
export class OrderEventsModule {}
