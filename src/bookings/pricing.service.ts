import { BadRequestException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Decimal } from 'decimal.js';
import { BookingSeatLine, PromoCode, Seat, Show } from '../entities';

export interface PriceQuote {
  lines: BookingSeatLine[];
  subtotal: number;
  fees: number;
  discount: number;
  finalAmount: number;
  currency: string;
}

/**
 * Prices a seat set from current show and seat data:
 * base price + tier delta per seat, a per-seat convenience fee, and a
 * promo discount capped at the subtotal. All arithmetic is decimal and
 * rounded to cents.
 */
@Injectable()
export class PricingService {
  private readonly feePerSeat: Decimal;
  private readonly currency: string;

  constructor(private readonly configService: ConfigService) {
    this.feePerSeat = new Decimal(this.configService.get<number>('booking.convenienceFeePerSeat', 1.5));
    this.currency = this.configService.get<string>('booking.currency', 'USD');
  }

  quote(show: Show, seats: Seat[], promo: PromoCode | null): PriceQuote {
    const basePrice = new Decimal(show.basePrice);

    const lines: BookingSeatLine[] = seats.map((seat) => ({
      seatId: seat.id,
      label: seat.label,
      tier: seat.tier,
      price: toCents(basePrice.plus(seat.priceDelta)).toNumber(),
    }));

    const subtotal = lines.reduce((sum, line) => sum.plus(line.price), new Decimal(0));
    const fees = toCents(this.feePerSeat.times(seats.length));
    const discount = promo ? toCents(Decimal.min(discountFor(promo, subtotal), subtotal)) : new Decimal(0);
    const finalAmount = subtotal.minus(discount).plus(fees);

    return {
      lines,
      subtotal: subtotal.toNumber(),
      fees: fees.toNumber(),
      discount: discount.toNumber(),
      finalAmount: toCents(finalAmount).toNumber(),
      currency: this.currency,
    };
  }

  /**
   * Throws when the promo code cannot be applied at `now`.
   */
  assertRedeemable(promo: PromoCode | null, code: string, now: Date): asserts promo is PromoCode {
    if (!promo || !promo.isActive) {
      throw new BadRequestException(`Promo code ${code} is not valid`);
    }
    if (promo.validFrom && promo.validFrom.getTime() > now.getTime()) {
      throw new BadRequestException(`Promo code ${code} is not active yet`);
    }
    if (promo.validUntil && promo.validUntil.getTime() <= now.getTime()) {
      throw new BadRequestException(`Promo code ${code} has expired`);
    }
    if (promo.maxRedemptions !== null && promo.redemptions >= promo.maxRedemptions) {
      throw new BadRequestException(`Promo code ${code} has been fully redeemed`);
    }
  }
}

function discountFor(promo: PromoCode, subtotal: Decimal): Decimal {
  if (promo.percentOff !== null) {
    return subtotal.times(promo.percentOff).dividedBy(100);
  }
  if (promo.amountOff !== null) {
    return new Decimal(promo.amountOff);
  }
  return new Decimal(0);
}

function toCents(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}
