import { ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Booking, BookingStatus, Show } from '../entities';
import { SeatInventoryStore } from '../inventory/seat-inventory.store';
import { BookingEventsPublisher } from '../events/booking-events.publisher';
import { BookingEventPattern } from '../events/booking-events';
import { toBookingResponse } from '../bookings/booking.types';
import { CancellationQuoteDto } from '../dto/cancellation.dto';
import { InvariantViolationError } from '../common/errors';
import { CancellationResult } from './cancellation.types';
import { calculateRefund, RefundPolicy } from './refund-policy';

@Injectable()
export class CancellationsService {
  private readonly logger = new Logger(CancellationsService.name);
  private readonly policy: RefundPolicy;

  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    @InjectRepository(Show)
    private readonly showRepository: Repository<Show>,
    private readonly dataSource: DataSource,
    private readonly inventoryStore: SeatInventoryStore,
    private readonly eventsPublisher: BookingEventsPublisher,
    private readonly configService: ConfigService,
  ) {
    this.policy = {
      cutoffMinutes: this.configService.get<number>('booking.cancellationCutoffMinutes', 120),
      fullRefundHours: this.configService.get<number>('booking.fullRefundHours', 24),
      partialRefundPercent: this.configService.get<number>('booking.partialRefundPercent', 50),
    };
  }

  /**
   * Cancels a confirmed booking, returns its seats straight to AVAILABLE and
   * announces the refund owed. Money moves later, when the refund
   * settlement consumer handles `booking.cancelled`.
   */
  async cancelBooking(bookingId: string, actorId: string, now = new Date()): Promise<CancellationResult> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const booking = await queryRunner.manager.findOne(Booking, {
        where: { id: bookingId },
        lock: { mode: 'pessimistic_write' },
      });

      if (!booking) {
        throw new NotFoundException(`Booking ${bookingId} not found`);
      }
      if (booking.actorId !== actorId) {
        throw new ForbiddenException('Booking belongs to another actor');
      }
      if (booking.status !== BookingStatus.CONFIRMED) {
        await queryRunner.commitTransaction();
        this.logger.warn(`Booking ${bookingId} is ${booking.status} and cannot be cancelled`);
        return { outcome: 'NOT_CANCELLABLE', status: booking.status };
      }

      const show = await queryRunner.manager.findOne(Show, { where: { id: booking.showId } });
      if (!show) {
        throw new InvariantViolationError('Confirmed booking references a missing show', {
          bookingId,
          showId: booking.showId,
        });
      }

      const decision = calculateRefund(booking.finalAmount, show.scheduledAt, now, this.policy);
      if (!decision.eligible) {
        await queryRunner.commitTransaction();
        this.logger.warn(`Booking ${bookingId} is ${decision.minutesToShow} minutes from its show, too late to cancel`);
        return {
          outcome: 'TOO_LATE_TO_CANCEL',
          minutesToShow: decision.minutesToShow,
          cutoffMinutes: this.policy.cutoffMinutes,
        };
      }

      const released = await this.inventoryStore.releaseBooked(
        booking.showId,
        booking.seatIds,
        booking.id,
        queryRunner.manager,
      );
      if (released.status !== 'OK') {
        throw new InvariantViolationError('Confirmed booking does not own its seats', {
          bookingId,
          showId: booking.showId,
        });
      }

      booking.transitionTo(BookingStatus.CANCELLED);
      booking.refundAmount = decision.refundAmount;
      booking.cancelledAt = now;
      await queryRunner.manager.save(Booking, booking);

      await queryRunner.commitTransaction();

      this.logger.log(
        `Booking ${booking.id} cancelled with refund of ${decision.refundAmount} ${booking.currency} (${decision.refundPercent}%)`,
      );

      this.eventsPublisher.publish(BookingEventPattern.BOOKING_CANCELLED, {
        showId: booking.showId,
        seatIds: booking.seatIds,
        bookingId: booking.id,
        bookingCode: booking.code,
        actorId: booking.actorId,
        reason: 'CANCELLED_BY_ACTOR',
        refundAmount: decision.refundAmount,
        currency: booking.currency,
        paymentTransactionId: booking.paymentTransactionId ?? undefined,
      });

      return {
        outcome: 'CANCELLED',
        booking: toBookingResponse(booking),
        refundAmount: decision.refundAmount,
        refundPercent: decision.refundPercent,
      };
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to cancel booking ${bookingId}: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * What cancelling at `now` would refund. Reads only.
   */
  async quoteCancellation(bookingId: string, now = new Date()): Promise<CancellationQuoteDto> {
    const booking = await this.bookingRepository.findOne({ where: { id: bookingId } });
    if (!booking) {
      throw new NotFoundException(`Booking ${bookingId} not found`);
    }

    const show = await this.showRepository.findOne({ where: { id: booking.showId } });
    if (!show) {
      throw new NotFoundException(`Show ${booking.showId} not found`);
    }

    const decision = calculateRefund(booking.finalAmount, show.scheduledAt, now, this.policy);
    const cancellable = booking.status === BookingStatus.CONFIRMED && decision.eligible;

    return {
      bookingId: booking.id,
      status: booking.status,
      cancellable,
      refundAmount: cancellable && decision.eligible ? decision.refundAmount : 0,
      refundPercent: cancellable && decision.eligible ? decision.refundPercent : 0,
      minutesToShow: decision.minutesToShow,
      currency: booking.currency,
    };
  }
}
