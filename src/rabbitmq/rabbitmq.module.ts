import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RabbitMQService } from './rabbitmq.service';
import { MessagePublisher } from './rabbitmq.types';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    RabbitMQService,
    { provide: MessagePublisher, useExisting: RabbitMQService },
  ],
  exports: [RabbitMQService, MessagePublisher],
})
export class RabbitMQModule {}
