import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy } from '@nestjs/microservices';
import { BookingEventPattern, SeatEvent, SeatEventInput } from './booking-events';

export const RABBITMQ_SERVICE = 'RABBITMQ_SERVICE';

/**
 * Emits domain events to the booking_events queue. Called only after the
 * owning transaction committed; a failed publish is logged and dropped.
 */
@Injectable()
export class BookingEventsPublisher {
  private readonly logger = new Logger(BookingEventsPublisher.name);

  constructor(
    @Inject(RABBITMQ_SERVICE)
    private readonly rabbitClient: ClientProxy,
  ) {}

  publish(eventType: BookingEventPattern, input: SeatEventInput): void {
    const event: SeatEvent = { ...input, eventType, timestamp: new Date().toISOString() };

    try {
      this.rabbitClient.emit(eventType, event).subscribe({
        error: (error: unknown) => this.logFailure(eventType, event, error),
      });
    } catch (error) {
      this.logFailure(eventType, event, error);
    }
  }

  private logFailure(eventType: BookingEventPattern, event: SeatEvent, error: unknown): void {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error(
      `Failed to publish ${eventType} for show ${event.showId}: ${errorMessage}`,
      error instanceof Error ? error.stack : undefined,
    );
  }
}
