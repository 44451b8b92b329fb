import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { RmqContext } from '@nestjs/microservices';
import { HoldsConsumer } from './holds.consumer';
import { HoldsService } from './holds.service';

describe('HoldsConsumer', () => {
  let consumer: HoldsConsumer;
  let holdsService: { expireHold: jest.Mock };
  let channel: { ack: jest.Mock; nack: jest.Mock };

  const message = (tag: number) => ({ fields: { deliveryTag: tag } });

  beforeEach(async () => {
    holdsService = { expireHold: jest.fn().mockResolvedValue(true) };
    channel = { ack: jest.fn(), nack: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HoldsConsumer],
      providers: [{ provide: HoldsService, useValue: holdsService }],
    }).compile();

    consumer = module.get<HoldsConsumer>(HoldsConsumer);

    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(async () => {
    await consumer.onModuleDestroy();
    jest.restoreAllMocks();
  });

  it('should expire every hold in a batch and ack on shutdown flush', async () => {
    const first = message(1);
    const second = message(2);

    await consumer.handleHoldExpire({ holdToken: 'h1' }, new RmqContext([first, channel, 'hold.expire']));
    await consumer.handleHoldExpire({ holdToken: 'h2' }, new RmqContext([second, channel, 'hold.expire']));
    await consumer.onModuleDestroy();

    expect(holdsService.expireHold).toHaveBeenCalledWith('h1');
    expect(holdsService.expireHold).toHaveBeenCalledWith('h2');
    expect(channel.ack).toHaveBeenCalledWith(first);
    expect(channel.ack).toHaveBeenCalledWith(second);
  });

  it('should fail the batch when any hold fails to expire', async () => {
    holdsService.expireHold.mockResolvedValueOnce(true).mockRejectedValueOnce(new Error('lock timeout'));

    await expect(
      consumer.expireBatch([{ data: { holdToken: 'h1' } }, { data: { holdToken: 'h2' } }]),
    ).rejects.toThrow('Batch processing had 1 failures');
  });
});
