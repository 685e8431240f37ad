import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Channel, ConsumeMessage, connect } from 'amqplib';
import {
  ConsumeOptions,
  ConsumerRegistration,
  MessageHandler,
  MessagePayload,
  MessagePublisher,
  RabbitMQExchangeType,
} from './rabbitmq.types';
import { errorMessage, errorTrace } from '../logging/error-trace';

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

const MIN_RECONNECT_DELAY_MS = 1_000;
const MAX_RECONNECT_DELAY_MS = 60_000;

@Injectable()
export class RabbitMQService
  extends MessagePublisher
  implements OnModuleInit, OnModuleDestroy
{
  private connection?: AmqpConnection;
  private channel?: Channel;
  private readonly logger = new Logger(RabbitMQService.name);
  private readonly consumers: ConsumerRegistration[] = [];
  private connecting?: Promise<void>;
  private reconnectTimer?: NodeJS.Timeout;
  private failedCycles = 0;
  private isShuttingDown = false;

  constructor(private readonly configService: ConfigService) {
    super();
  }

  get exchange(): string {
    return this.configService.get<string>('RABBITMQ_EXCHANGE') ?? 'events';
  }

  private get maxRetries(): number {
    return this.configService.get<number>('RABBITMQ_CONNECT_RETRIES') ?? 5;
  }

  private get retryDelay(): number {
    return this.configService.get<number>('RABBITMQ_RETRY_DELAY_MS') ?? 5000;
  }

  async onModuleInit() {
    await this.connectWithRetry();
  }

  async onModuleDestroy() {
    this.isShuttingDown = true;
    clearTimeout(this.reconnectTimer);
    await this.cleanup();
  }

  // Concurrent callers share the attempt already in flight.
  private connectWithRetry(): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.attemptConnect(0).finally(() => {
        this.connecting = undefined;
      });
    }
    return this.connecting;
  }

  private async attemptConnect(retryCount: number): Promise<void> {
    try {
      await this.connect();
      this.failedCycles = 0;
      this.logger.log('RabbitMQ connection established successfully');
    } catch (error) {
      this.logger.error(
        `Failed to connect to RabbitMQ (Attempt ${retryCount + 1}/${this.maxRetries + 1})`,
        errorTrace(error),
      );

      if (retryCount < this.maxRetries && !this.isShuttingDown) {
        await new Promise((resolve) => setTimeout(resolve, this.retryDelay));
        return this.attemptConnect(retryCount + 1);
      }

      this.logger.error(
        `Failed to connect after ${this.maxRetries + 1} attempts`,
      );
      this.scheduleReconnect();
    }
  }

  // Another full retry cycle, with the pause doubling up to a cap.
  private scheduleReconnect(): void {
    if (this.isShuttingDown) return;
    const delay = Math.min(
      Math.max(this.retryDelay, MIN_RECONNECT_DELAY_MS) * 2 ** this.failedCycles,
      MAX_RECONNECT_DELAY_MS,
    );
    this.failedCycles++;
    this.logger.warn(`Next RabbitMQ reconnect cycle in ${delay}ms`);

    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.channel || this.isShuttingDown) return;
      void this.connectWithRetry();
    }, delay);
    this.reconnectTimer.unref();
  }

  private async connect(): Promise<void> {
    const url =
      this.configService.get<string>('RABBITMQ_URI') ?? 'amqp://localhost:5672';
    const connection = await connect(url);

    connection.on('error', (err: Error) => {
      this.logger.error('RabbitMQ connection error', err.stack);
    });

    connection.on('close', () => {
      if (this.connection !== connection) return;
      this.connection = undefined;
      this.channel = undefined;
      if (this.isShuttingDown) return;
      this.logger.warn('RabbitMQ connection closed. Attempting to reconnect...');
      void this.connectWithRetry();
    });

    const channel = await connection.createChannel();

    channel.on('error', (err: Error) => {
      this.logger.error('RabbitMQ channel error', err.stack);
    });

    // A channel closed by the broker takes its consumers with it: drop the
    // connection and go through the normal reconnect.
    channel.on('close', () => {
      if (this.channel !== channel) return;
      this.channel = undefined;
      if (this.isShuttingDown) return;
      this.logger.warn('RabbitMQ channel closed. Attempting to reconnect...');
      this.connection = undefined;
      void connection.close().catch((error: unknown) => {
        this.logger.warn(
          `Previous RabbitMQ connection did not close cleanly: ${errorMessage(error)}`,
        );
      });
      void this.connectWithRetry();
    });

    await channel.assertExchange(this.exchange, RabbitMQExchangeType.TOPIC, {
      durable: true,
    });

    this.connection = connection;
    this.channel = channel;

    // Consumers registered before a reconnect are bound again on the new channel.
    for (const consumer of this.consumers) {
      await this.setupConsumer(channel, consumer);
    }
  }

  private async cleanup(): Promise<void> {
    try {
      if (this.channel) {
        await this.channel.close();
      }
      if (this.connection) {
        await this.connection.close();
      }
    } catch (error) {
      this.logger.error('Error during cleanup', errorTrace(error));
    } finally {
      this.channel = undefined;
      this.connection = undefined;
    }
  }

  private async ensureChannel(): Promise<Channel> {
    if (!this.channel) {
      this.logger.warn(
        'RabbitMQ channel not available, attempting to reconnect...',
      );
      await this.connectWithRetry();
    }
    if (!this.channel) {
      throw new Error('RabbitMQ channel is not initialized');
    }
    return this.channel;
  }

  async publish(routingKey: string, payload: MessagePayload): Promise<void> {
    const body = Buffer.from(JSON.stringify(payload));
    const channel = await this.ensureChannel();

    try {
      this.write(channel, routingKey, body);
    } catch (error) {
      this.logger.error(
        `Failed to publish message to ${this.exchange}, retrying once`,
        errorTrace(error),
      );
      await this.cleanup();
      this.write(await this.ensureChannel(), routingKey, body);
    }

    this.logger.log(
      `Published message to ${this.exchange} with routing key ${routingKey}`,
    );
  }

  private write(channel: Channel, routingKey: string, body: Buffer): void {
    channel.publish(this.exchange, routingKey, body, {
      persistent: true,
      contentType: 'application/json',
    });
  }

  /**
   * Binds a durable queue to the exchange under every pattern and delivers
   * each message to `handler` with manual acknowledgement: ack once the
   * handler resolves, nack (requeued per `options.requeueOnError`) when it
   * rejects.
   */
  async consume(
    queue: string,
    patterns: readonly string[],
    handler: MessageHandler,
    options: ConsumeOptions,
  ): Promise<void> {
    const registration: ConsumerRegistration = {
      queue,
      patterns,
      handler,
      options,
    };
    this.consumers.push(registration);

    if (!this.channel) {
      this.logger.warn(
        `RabbitMQ channel not available, ${queue} will be consumed once connected`,
      );
      // connect() binds every registered consumer, this one included.
      await this.connectWithRetry();
      return;
    }
    await this.setupConsumer(this.channel, registration);
  }

  private async setupConsumer(
    channel: Channel,
    registration: ConsumerRegistration,
  ): Promise<void> {
    const { queue, patterns, options } = registration;

    await channel.prefetch(options.prefetch);
    await channel.assertQueue(queue, { durable: true });
    for (const pattern of patterns) {
      await channel.bindQueue(queue, this.exchange, pattern);
    }

    await channel.consume(
      queue,
      (msg) => {
        if (!msg) return;
        void this.dispatch(channel, msg, registration);
      },
      { noAck: false },
    );

    this.logger.log(`Subscribed to queue: ${queue} (${patterns.join(', ')})`);
  }

  private async dispatch(
    channel: Channel,
    msg: ConsumeMessage,
    { queue, handler, options }: ConsumerRegistration,
  ): Promise<void> {
    const { routingKey } = msg.fields;
    try {
      await handler(routingKey, msg.content);
      channel.ack(msg);
    } catch (error) {
      this.logger.error(
        `Failed to process ${routingKey} from ${queue} (requeue=${options.requeueOnError})`,
        errorTrace(error),
      );
      try {
        channel.nack(msg, false, options.requeueOnError);
      } catch (nackError) {
        this.logger.error('Failed to nack message', errorTrace(nackError));
      }
    }
  }
}
