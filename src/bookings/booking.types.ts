import { BookingResponseDto } from '../dto/booking.dto';
import { Booking } from '../entities';

export type BookingResult =
  | { outcome: 'CONFIRMED'; booking: BookingResponseDto }
  | { outcome: 'HOLD_EXPIRED'; refundIssued: boolean; bookingId?: string }
  | { outcome: 'PAYMENT_FAILED'; reason: string; bookingId: string }
  | { outcome: 'IN_PROGRESS'; bookingId: string };

export interface SubmitBookingOptions {
  actorId: string;
  promoCode?: string;
  idempotencyKey?: string;
}

export class BookingCodeCollisionError extends Error {
  constructor(readonly code: string) {
    super(`Booking code ${code} already taken`);
    this.name = 'BookingCodeCollisionError';
  }
}

export function toBookingResponse(booking: Booking): BookingResponseDto {
  return {
    id: booking.id,
    code: booking.code,
    showId: booking.showId,
    actorId: booking.actorId,
    seatIds: booking.seatIds,
    seats: booking.seats,
    subtotal: booking.subtotal,
    fees: booking.fees,
    discount: booking.discount,
    finalAmount: booking.finalAmount,
    currency: booking.currency,
    promoCode: booking.promoCode,
    status: booking.status,
    paymentTransactionId: booking.paymentTransactionId,
    failureReason: booking.failureReason,
    refundAmount: booking.refundAmount,
    confirmedAt: booking.confirmedAt,
    cancelledAt: booking.cancelledAt,
    createdAt: booking.createdAt,
  };
}
