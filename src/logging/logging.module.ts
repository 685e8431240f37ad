import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ELASTICSEARCH_HOST,
  ElasticsearchLoggerService,
  LOG_LEVEL,
} from './elasticsearch-logger.service';

@Global()
@Module({
  providers: [
    {
      provide: ELASTICSEARCH_HOST,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        config.get<string>('ELASTICSEARCH_HOST') ?? '',
    },
    {
      provide: LOG_LEVEL,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        config.get<string>('LOG_LEVEL') ?? 'info',
    },
    ElasticsearchLoggerService,
  ],
  exports: [ElasticsearchLoggerService],
})
export class LoggingModule {}
