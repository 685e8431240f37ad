import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RabbitMQService } from '../rabbitmq/rabbitmq.service';
import { ORDER_BINDING_PATTERNS } from '../rabbitmq/rabbitmq.types';
import { OrderEventRouter } from './order-event.router';

@Injectable()
export class OrderEventsConsumer implements OnApplicationBootstrap {
  constructor(
    private readonly rabbitMQService: RabbitMQService,
    private readonly router: OrderEventRouter,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap() {
    await this.rabbitMQService.consume(
      this.configService.get<string>('RABBITMQ_QUEUE') ??
        'product-service.orders',
      ORDER_BINDING_PATTERNS,
      (routingKey, content) => this.router.route(routingKey, content),
      {
        prefetch: this.configService.get<number>('RABBITMQ_PREFETCH') ?? 16,
        requeueOnError:
          this.configService.get<boolean>('RABBITMQ_REQUEUE_ON_ERROR') ?? false,
      },
    );
  }
}
