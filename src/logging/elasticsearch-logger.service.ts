import { Inject, Injectable, LoggerService } from '@nestjs/common';
import * as winston from 'winston';
import { ElasticsearchTransport } from 'winston-elasticsearch';
import { LogLevel } from '../config/env.validation';

export const ELASTICSEARCH_HOST = 'ELASTICSEARCH_HOST';
export const LOG_LEVEL = 'LOG_LEVEL';

@Injectable()
export class ElasticsearchLoggerService implements LoggerService {
  private readonly logger: winston.Logger;

  constructor(
    @Inject(ELASTICSEARCH_HOST)
    private readonly elasticsearchHost: string,
    @Inject(LOG_LEVEL) level: LogLevel,
  ) {
    this.logger = winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
      transports: [new winston.transports.Console()],
    });

    // Console only when no cluster is configured (local runs, tests).
    if (elasticsearchHost) {
      this.logger.add(
        new ElasticsearchTransport({
          level,
          indexPrefix: 'product-catalog',
          clientOpts: { node: elasticsearchHost },
        }),
      );
    }
  }

  log(message: string, context?: string) {
    this.logger.info({ message, context });
  }

  error(message: string, trace?: string, context?: string) {
    this.logger.error({ message, trace, context });
  }

  warn(message: string, context?: string) {
    this.logger.warn({ message, context });
  }

  debug(message: string, context?: string) {
    this.logger.debug({ message, context });
  }

  verbose(message: string, context?: string) {
    this.logger.verbose({ message, context });
  }
}
