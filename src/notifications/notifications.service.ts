import { Injectable, Logger } from '@nestjs/common';
import { BookingEventPattern, SeatEvent } from '../events/booking-events';

export type NotificationTemplate = 'booking-confirmed' | 'booking-cancelled';

export interface NotificationRecord {
  template: NotificationTemplate;
  actorId: string;
  bookingId: string;
  bookingCode?: string;
  showId: string;
  seatIds: string[];
  refundAmount?: number;
  currency?: string;
}

/**
 * Records customer notifications for confirmed and cancelled bookings.
 * Delivery (email/SMS) is handled elsewhere; this only emits the record.
 */
@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  notify(event: SeatEvent): NotificationRecord | null {
    const template = templateFor(event.eventType);
    if (!template || !event.bookingId || !event.actorId) {
      return null;
    }

    const record: NotificationRecord = {
      template,
      actorId: event.actorId,
      bookingId: event.bookingId,
      bookingCode: event.bookingCode,
      showId: event.showId,
      seatIds: event.seatIds,
      refundAmount: event.refundAmount,
      currency: event.currency,
    };

    this.logger.log(`Notification ${template} for ${record.actorId}: ${JSON.stringify(record)}`);
    return record;
  }
}

function templateFor(eventType: BookingEventPattern): NotificationTemplate | null {
  switch (eventType) {
    case BookingEventPattern.SEATS_BOOKED:
      return 'booking-confirmed';
    case BookingEventPattern.BOOKING_CANCELLED:
      return 'booking-cancelled';
    default:
      return null;
  }
}
