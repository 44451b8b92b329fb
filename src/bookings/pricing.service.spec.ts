import { Test } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PricingService } from './pricing.service';
import { PromoCode, Seat, SeatTier, Show } from '../entities';
import { configStub } from '../../test/support/config-stub';

describe('PricingService', () => {
  const now = new Date('2026-03-01T12:00:00.000Z');

  const show = Object.assign(new Show(), { id: 'show-1', basePrice: 10.1 });
  const seat = (label: string, tier = SeatTier.STANDARD, priceDelta = 0) =>
    Object.assign(new Seat(), { id: `seat-${label}`, label, tier, priceDelta });
  const promo = (overrides: Partial<PromoCode> = {}) =>
    Object.assign(new PromoCode(), {
      code: 'PROMO',
      percentOff: null,
      amountOff: null,
      validFrom: null,
      validUntil: null,
      maxRedemptions: null,
      redemptions: 0,
      isActive: true,
      ...overrides,
    });

  const service = async (overrides: Record<string, unknown> = {}) => {
    const module = await Test.createTestingModule({
      providers: [PricingService, { provide: ConfigService, useValue: configStub(overrides) }],
    }).compile();
    return module.get<PricingService>(PricingService);
  };

  describe('quote', () => {
    it('should add tier deltas and a per-seat fee without float drift', async () => {
      const quote = (await service()).quote(show, [seat('A1'), seat('A2'), seat('B1', SeatTier.VIP, 7.2)], null);

      expect(quote.lines.map((line) => line.price)).toEqual([10.1, 10.1, 17.3]);
      expect(quote.subtotal).toBe(37.5);
      expect(quote.fees).toBe(4.5);
      expect(quote.discount).toBe(0);
      expect(quote.finalAmount).toBe(42);
      expect(quote.currency).toBe('USD');
    });

    it('should take the fee and currency from configuration', async () => {
      const quote = (await service({ 'booking.convenienceFeePerSeat': 0.75, 'booking.currency': 'BRL' })).quote(
        show,
        [seat('A1')],
        null,
      );

      expect(quote.fees).toBe(0.75);
      expect(quote.finalAmount).toBe(10.85);
      expect(quote.currency).toBe('BRL');
    });

    it('should round a percentage discount to cents', async () => {
      const quote = (await service()).quote(show, [seat('A1'), seat('A2')], promo({ percentOff: 15 }));

      expect(quote.subtotal).toBe(20.2);
      expect(quote.discount).toBe(3.03);
      expect(quote.finalAmount).toBe(20.17);
    });

    it('should cap a fixed discount at the subtotal but still charge fees', async () => {
      const quote = (await service()).quote(show, [seat('A1')], promo({ amountOff: 50 }));

      expect(quote.discount).toBe(10.1);
      expect(quote.finalAmount).toBe(1.5);
    });
  });

  describe('assertRedeemable', () => {
    it('should accept an active promo inside its window', async () => {
      const pricing = await service();
      const active = promo({ validFrom: new Date('2026-01-01'), validUntil: new Date('2026-12-31'), maxRedemptions: 5 });

      expect(() => pricing.assertRedeemable(active, 'PROMO', now)).not.toThrow();
    });

    it.each([
      ['missing', null, 'is not valid'],
      ['inactive', promo({ isActive: false }), 'is not valid'],
      ['not yet valid', promo({ validFrom: new Date('2026-04-01') }), 'is not active yet'],
      ['expired', promo({ validUntil: now }), 'has expired'],
      ['exhausted', promo({ maxRedemptions: 2, redemptions: 2 }), 'has been fully redeemed'],
    ])('should reject a %s promo', async (_case, candidate, message) => {
      const pricing = await service();
      expect(() => pricing.assertRedeemable(candidate, 'PROMO', now)).toThrow(BadRequestException);
      expect(() => pricing.assertRedeemable(candidate, 'PROMO', now)).toThrow(`Promo code PROMO ${message}`);
    });
  });
});
