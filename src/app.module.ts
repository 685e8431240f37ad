import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { AppController } from './app.controller';
import { validate } from './config/env.validation';
import { LoggingModule } from './logging/logging.module';
import { OrderEventsModule } from './order-events/order-events.module';
import { ProductModule } from './product/product.module';
import { RabbitMQModule } from './rabbitmq/rabbitmq.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.get<string>('MONGODB_URI'),
      }),
    }),
    LoggingModule,
    RabbitMQModule,
    ProductModule,
    OrderEventsModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
