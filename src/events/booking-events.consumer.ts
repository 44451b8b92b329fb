import { Controller, Logger } from '@nestjs/common';
import { Ctx, EventPattern, Payload, RmqContext } from '@nestjs/microservices';
import { AvailabilityGateway } from './availability.gateway';
import { BookingEventPattern, SeatEvent } from './booking-events';
import { NotificationsService } from '../notifications/notifications.service';
import { RefundSettlementService } from '../payments/refund-settlement.service';
import { rmqHandles } from '../utils/rmq-context.util';

/**
 * Consumes booking_events. Each event is broadcast to seat-map viewers,
 * then handed to notifications and refund settlement where relevant.
 *
 * Broadcast and notification failures are logged and never nack; a refund
 * that cannot be settled nacks the message so it is redelivered.
 */
@Controller()
export class BookingEventsConsumer {
  private readonly logger = new Logger(BookingEventsConsumer.name);

  constructor(
    private readonly availabilityGateway: AvailabilityGateway,
    private readonly notificationsService: NotificationsService,
    private readonly refundSettlementService: RefundSettlementService,
  ) {}

  @EventPattern(BookingEventPattern.SEATS_HELD)
  handleSeatsHeld(@Payload() event: SeatEvent, @Ctx() context: RmqContext): Promise<void> {
    return this.consume(event, context);
  }

  @EventPattern(BookingEventPattern.SEATS_BOOKED)
  handleSeatsBooked(@Payload() event: SeatEvent, @Ctx() context: RmqContext): Promise<void> {
    return this.consume(event, context);
  }

  @EventPattern(BookingEventPattern.SEATS_RELEASED)
  handleSeatsReleased(@Payload() event: SeatEvent, @Ctx() context: RmqContext): Promise<void> {
    return this.consume(event, context);
  }

  @EventPattern(BookingEventPattern.BOOKING_CANCELLED)
  handleBookingCancelled(@Payload() event: SeatEvent, @Ctx() context: RmqContext): Promise<void> {
    return this.consume(event, context);
  }

  @EventPattern(BookingEventPattern.BOOKING_EXPIRED)
  handleBookingExpired(@Payload() event: SeatEvent, @Ctx() context: RmqContext): Promise<void> {
    return this.consume(event, context);
  }

  @EventPattern(BookingEventPattern.PAYMENT_TIMED_OUT)
  handlePaymentTimedOut(@Payload() event: SeatEvent, @Ctx() context: RmqContext): Promise<void> {
    return this.consume(event, context);
  }

  async dispatch(event: SeatEvent): Promise<void> {
    this.availabilityGateway.broadcast(event);

    switch (event.eventType) {
      case BookingEventPattern.SEATS_BOOKED:
        this.sendNotification(event);
        return;
      case BookingEventPattern.BOOKING_CANCELLED:
        this.sendNotification(event);
        await this.settleRefund(event);
        return;
      case BookingEventPattern.BOOKING_EXPIRED:
      case BookingEventPattern.PAYMENT_TIMED_OUT:
        await this.settleRefund(event);
        return;
      case BookingEventPattern.SEATS_HELD:
      case BookingEventPattern.SEATS_RELEASED:
        return;
    }
  }

  private async consume(event: SeatEvent, context: RmqContext): Promise<void> {
    const { channel, message } = rmqHandles(context);

    try {
      this.logger.log(`${event.eventType} on show ${event.showId}: ${event.seatIds.join(', ')}`);
      await this.dispatch(event);
      channel.ack(message);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Failed to process ${event.eventType} for booking ${event.bookingId ?? '-'}: ${errorMessage}`,
        error instanceof Error ? error.stack : undefined,
      );
      channel.nack(message, false, true);
    }
  }

  private sendNotification(event: SeatEvent): void {
    try {
      this.notificationsService.notify(event);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Notification for booking ${event.bookingId ?? '-'} failed: ${errorMessage}`);
    }
  }

  private async settleRefund(event: SeatEvent): Promise<void> {
    if (!event.bookingId) {
      return;
    }

    await this.refundSettlementService.settle({
      bookingId: event.bookingId,
      paymentTransactionId: event.paymentTransactionId,
      refundAmount: event.refundAmount,
      currency: event.currency,
      chargeIdempotencyKey: event.chargeIdempotencyKey,
    });
  }
}
