import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PaymentsService } from './payments.service';
import { PaymentGateway } from './payment-gateway';

describe('PaymentsService', () => {
  let service: PaymentsService;
  let gateway: { charge: jest.Mock; refund: jest.Mock };

  const request = { amount: 25.5, currency: 'USD', method: 'tok_visa', idempotencyKey: 'hold:t1' };

  beforeEach(async () => {
    gateway = { charge: jest.fn(), refund: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PaymentsService,
        { provide: PaymentGateway, useValue: gateway },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn().mockReturnValue(50), // payment timeout in ms
          },
        },
      ],
    }).compile();

    service = module.get<PaymentsService>(PaymentsService);

    jest.spyOn(service['logger'], 'warn').mockImplementation();
    jest.spyOn(service['logger'], 'error').mockImplementation();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should map a successful charge', async () => {
    gateway.charge.mockResolvedValue({ status: 'SUCCESS', transactionId: 'txn_1' });

    await expect(service.charge(request)).resolves.toEqual({ outcome: 'SUCCESS', transactionId: 'txn_1' });
    expect(gateway.charge).toHaveBeenCalledWith(request);
  });

  it('should map a decline', async () => {
    gateway.charge.mockResolvedValue({ status: 'FAILURE', reason: 'CARD_DECLINED' });

    await expect(service.charge(request)).resolves.toEqual({ outcome: 'FAILURE', reason: 'CARD_DECLINED' });
  });

  it('should report a timeout when the gateway does not answer in time', async () => {
    gateway.charge.mockReturnValue(new Promise(() => undefined));

    await expect(service.charge(request)).resolves.toEqual({ outcome: 'TIMEOUT' });
  });

  it('should turn a gateway error into a failure', async () => {
    gateway.charge.mockRejectedValue(new Error('socket hang up'));

    await expect(service.charge(request)).resolves.toEqual({ outcome: 'FAILURE', reason: 'GATEWAY_ERROR' });
  });
});
