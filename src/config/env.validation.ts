import {
  plainToInstance,
  Transform,
  TransformFnParams,
} from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

export const LOG_LEVELS = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// Reads the raw value: implicit conversion has already turned "false" into true.
const toBoolean = ({ obj, key }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  if (typeof raw !== 'string') return raw;
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no', ''].includes(normalized)) return false;
  return raw;
};

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  @MinLength(1)
  MONGODB_URI: string = 'mongodb://localhost:27017/catalog';

  @IsString()
  @MinLength(1)
  RABBITMQ_URI: string = 'amqp://localhost:5672';

  @IsString()
  @MinLength(1)
  RABBITMQ_EXCHANGE: string = 'events';

  @IsString()
  @MinLength(1)
  RABBITMQ_QUEUE: string = 'product-service.orders';

  @IsInt()
  @Min(1)
  RABBITMQ_PREFETCH: number = 16;

  @Transform(toBoolean)
  @IsBoolean()
  RABBITMQ_REQUEUE_ON_ERROR: boolean = false;

  @IsInt()
  @Min(0)
  RABBITMQ_CONNECT_RETRIES: number = 5;

  @IsInt()
  @Min(0)
  RABBITMQ_RETRY_DELAY_MS: number = 5000;

  @IsOptional()
  @IsString()
  ELASTICSEARCH_HOST?: string;

  @IsIn(LOG_LEVELS)
  LOG_LEVEL: LogLevel = 'info';
}

/**
 * Validates `process.env` for `ConfigModule.forRoot`. Numeric variables are
 * converted implicitly, unset ones keep the class defaults.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) =>
        Object.values(error.constraints ?? {})
          .map((message) => `  - ${message}`)
          .join('\n'),
      )
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return validated;
}
