import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ConsumeMessage, connect } from 'amqplib';
import { RabbitMQService } from '../rabbitmq.service';

jest.mock('amqplib', () => ({ connect: jest.fn() }));

type ConsumeCallback = (msg: ConsumeMessage | null) => void;

function createChannel() {
  return {
    on: jest.fn(),
    assertExchange: jest.fn().mockResolvedValue(undefined),
    prefetch: jest.fn().mockResolvedValue(undefined),
    assertQueue: jest.fn().mockResolvedValue(undefined),
    bindQueue: jest.fn().mockResolvedValue(undefined),
    consume: jest.fn().mockResolvedValue({ consumerTag: 'test-consumer' }),
    publish: jest.fn().mockReturnValue(true),
    ack: jest.fn(),
    nack: jest.fn(),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

function createConnection(channel: ReturnType<typeof createChannel>) {
  return {
    on: jest.fn(),
    createChannel: jest.fn().mockResolvedValue(channel),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

function message(routingKey: string, body: string): ConsumeMessage {
  return {
    fields: { routingKey },
    content: Buffer.from(body),
  } as unknown as ConsumeMessage;
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

function listener(
  emitter: { on: jest.Mock },
  event: string,
): (...args: unknown[]) => void {
  const registered = emitter.on.mock.calls.find(([name]) => name === event);
  if (!registered) {
    throw new Error(`No ${event} listener registered`);
  }
  return registered[1];
}

describe('RabbitMQService', () => {
  const mockedConnect = jest.mocked(connect);
  const config: Record<string, unknown> = {
    RABBITMQ_URI: 'amqp://test-host:5672',
    RABBITMQ_EXCHANGE: 'events',
    RABBITMQ_CONNECT_RETRIES: 0,
    RABBITMQ_RETRY_DELAY_MS: 0,
  };
  let service: RabbitMQService;
  let channel: ReturnType<typeof createChannel>;
  let connection: ReturnType<typeof createConnection>;

  function connectTo(conn: ReturnType<typeof createConnection>) {
    mockedConnect.mockResolvedValueOnce(
      conn as unknown as Awaited<ReturnType<typeof connect>>,
    );
  }

  function deliveredTo(): ConsumeCallback {
    const [, callback] = channel.consume.mock.calls[0];
    return callback;
  }

  beforeEach(async () => {
    mockedConnect.mockReset();
    channel = createChannel();
    connection = createConnection(channel);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RabbitMQService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    service = module.get(RabbitMQService);
  });

  afterEach(async () => {
    await service.onModuleDestroy();
    jest.useRealTimers();
  });

  it('should connect and declare a durable topic exchange', async () => {
    connectTo(connection);

    await service.onModuleInit();

    expect(mockedConnect).toHaveBeenCalledWith('amqp://test-host:5672');
    expect(channel.assertExchange).toHaveBeenCalledWith('events', 'topic', {
      durable: true,
    });
  });

  it('should publish persistent JSON to the exchange', async () => {
    connectTo(connection);
    await service.onModuleInit();

    await service.publish('order.confirmed', { order_id: 1 });

    expect(channel.publish).toHaveBeenCalledWith(
      'events',
      'order.confirmed',
      Buffer.from('{"order_id":1}'),
      { persistent: true, contentType: 'application/json' },
    );
  });

  it('should fail to publish when no broker can be reached', async () => {
    mockedConnect.mockRejectedValue(new Error('connection refused'));

    await expect(service.publish('order.confirmed', {})).rejects.toThrow(
      'RabbitMQ channel is not initialized',
    );
  });

  describe('consume', () => {
    const handler = jest.fn();

    beforeEach(async () => {
      handler.mockReset();
      connectTo(connection);
      await service.onModuleInit();
    });

    it('should bind the queue under every pattern with manual acks', async () => {
      await service.consume('orders', ['order.#', 'customer.#'], handler, {
        prefetch: 16,
        requeueOnError: false,
      });

      expect(channel.prefetch).toHaveBeenCalledWith(16);
      expect(channel.assertQueue).toHaveBeenCalledWith('orders', { durable: true });
      expect(channel.bindQueue.mock.calls).toEqual([
        ['orders', 'events', 'order.#'],
        ['orders', 'events', 'customer.#'],
      ]);
      expect(channel.consume).toHaveBeenCalledWith('orders', expect.any(Function), {
        noAck: false,
      });
    });

    it('should ack once the handler resolves', async () => {
      handler.mockResolvedValue(undefined);
      await service.consume('orders', ['order.#'], handler, {
        prefetch: 1,
        requeueOnError: false,
      });
      const msg = message('order.created', '{"order_id":1}');

      deliveredTo()(msg);
      await flush();

      expect(handler).toHaveBeenCalledWith('order.created', msg.content);
      expect(channel.ack).toHaveBeenCalledWith(msg);
      expect(channel.nack).not.toHaveBeenCalled();
    });

    it.each([false, true])(
      'should nack a failed message with requeue=%s',
      async (requeueOnError) => {
        handler.mockRejectedValue(new Error('boom'));
        await service.consume('orders', ['order.#'], handler, {
          prefetch: 1,
          requeueOnError,
        });
        const msg = message('order.created', '{}');

        deliveredTo()(msg);
        await flush();

        expect(channel.ack).not.toHaveBeenCalled();
        expect(channel.nack).toHaveBeenCalledWith(msg, false, requeueOnError);
      },
    );
  });

  it('should bind a consumer registered before the broker was reachable', async () => {
    mockedConnect.mockRejectedValueOnce(new Error('connection refused'));
    await service.onModuleInit();
    connectTo(connection);

    await service.consume('orders', ['order.#'], jest.fn(), {
      prefetch: 4,
      requeueOnError: false,
    });

    expect(channel.bindQueue).toHaveBeenCalledTimes(1);
    expect(channel.consume).toHaveBeenCalledTimes(1);
  });

  it('should reconnect and bind consumers again after the connection closes', async () => {
    connectTo(connection);
    await service.onModuleInit();
    await service.consume('orders', ['order.#'], jest.fn(), {
      prefetch: 4,
      requeueOnError: false,
    });
    const nextChannel = createChannel();
    connectTo(createConnection(nextChannel));

    listener(connection, 'close')();
    await flush();

    expect(mockedConnect).toHaveBeenCalledTimes(2);
    expect(nextChannel.bindQueue).toHaveBeenCalledWith('orders', 'events', 'order.#');
    expect(nextChannel.consume).toHaveBeenCalledTimes(1);
  });

  it('should not reconnect after shutdown', async () => {
    connectTo(connection);
    await service.onModuleInit();

    await service.onModuleDestroy();
    listener(connection, 'close')();
    await flush();

    expect(channel.close).toHaveBeenCalled();
    expect(connection.close).toHaveBeenCalled();
    expect(mockedConnect).toHaveBeenCalledTimes(1);
  });

  it('should start another reconnect cycle once the retries are spent', async () => {
    jest.useFakeTimers();
    connectTo(connection);
    await service.onModuleInit();
    await service.consume('orders', ['order.#'], jest.fn(), {
      prefetch: 4,
      requeueOnError: false,
    });
    mockedConnect.mockRejectedValueOnce(new Error('connection refused'));
    const nextChannel = createChannel();
    connectTo(createConnection(nextChannel));

    listener(connection, 'close')();
    await jest.advanceTimersByTimeAsync(999);
    expect(mockedConnect).toHaveBeenCalledTimes(2);
    expect(nextChannel.consume).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    expect(mockedConnect).toHaveBeenCalledTimes(3);
    expect(nextChannel.bindQueue).toHaveBeenCalledWith('orders', 'events', 'order.#');
    expect(nextChannel.consume).toHaveBeenCalledTimes(1);
  });

  it('should stop reconnecting once shut down', async () => {
    jest.useFakeTimers();
    mockedConnect.mockRejectedValue(new Error('connection refused'));
    await service.onModuleInit();

    await service.onModuleDestroy();
    await jest.advanceTimersByTimeAsync(120_000);

    expect(mockedConnect).toHaveBeenCalledTimes(1);
  });

  it('should reconnect when the broker closes the channel', async () => {
    connectTo(connection);
    await service.onModuleInit();
    await service.consume('orders', ['order.#'], jest.fn(), {
      prefetch: 4,
      requeueOnError: false,
    });
    const nextChannel = createChannel();
    connectTo(createConnection(nextChannel));

    listener(channel, 'error')(new Error('PRECONDITION_FAILED'));
    listener(channel, 'close')();
    await flush();

    expect(connection.close).toHaveBeenCalled();
    expect(mockedConnect).toHaveBeenCalledTimes(2);
    expect(nextChannel.consume).toHaveBeenCalledTimes(1);
  });
});
