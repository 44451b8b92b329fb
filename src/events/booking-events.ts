import { SeatStatus } from '../entities';

export enum BookingEventPattern {
  SEATS_HELD = 'seats.held',
  SEATS_BOOKED = 'seats.booked',
  SEATS_RELEASED = 'seats.released',
  BOOKING_CANCELLED = 'booking.cancelled',
  BOOKING_EXPIRED = 'booking.expired',
  PAYMENT_TIMED_OUT = 'payment.timed_out',
}

export interface SeatEvent {
  eventType: BookingEventPattern;
  showId: string;
  seatIds: string[];
  bookingId?: string;
  bookingCode?: string;
  holdToken?: string;
  actorId?: string;
  reason?: string;
  refundAmount?: number;
  currency?: string;
  paymentTransactionId?: string;
  chargeIdempotencyKey?: string;
  timestamp: string;
}

export type SeatEventInput = Omit<SeatEvent, 'eventType' | 'timestamp'>;

/**
 * Seat status a viewer should show after the event, or null when the
 * event carries no seat change of its own.
 */
export function seatStatusAfter(eventType: BookingEventPattern): SeatStatus | null {
  switch (eventType) {
    case BookingEventPattern.SEATS_HELD:
      return SeatStatus.HELD;
    case BookingEventPattern.SEATS_BOOKED:
      return SeatStatus.BOOKED;
    case BookingEventPattern.SEATS_RELEASED:
    case BookingEventPattern.BOOKING_CANCELLED:
      return SeatStatus.AVAILABLE;
    case BookingEventPattern.BOOKING_EXPIRED:
    case BookingEventPattern.PAYMENT_TIMED_OUT:
      return null;
  }
}
