import { BadRequestException, ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { Booking, BookingStatus, BOOKING_CODE_CONSTRAINT, BOOKING_IDEMPOTENCY_CONSTRAINT, Hold, PromoCode, Seat, Show } from '../entities';
import { SeatInventoryStore } from '../inventory/seat-inventory.store';
import { PaymentsService } from '../payments/payments.service';
import { PaymentOutcome } from '../payments/payment-gateway';
import { BookingEventsPublisher } from '../events/booking-events.publisher';
import { BookingEventPattern } from '../events/booking-events';
import { PricingService } from './pricing.service';
import { BookingCodeGenerator } from './booking-code.generator';
import {
  BookingCodeCollisionError,
  BookingResult,
  SubmitBookingOptions,
  toBookingResponse,
} from './booking.types';
import { BookingResponseDto } from '../dto/booking.dto';
import { InvariantViolationError, assertNever, isUniqueViolation } from '../common/errors';
import { retryWithBackoff } from '../utils/retry.util';

const PAYMENT_TIMEOUT = 'PAYMENT_TIMEOUT';

type OpenedAttempt = { kind: 'OPENED'; booking: Booking } | { kind: 'SETTLED'; result: BookingResult };

/**
 * Drives hold -> pay -> confirm or release for one booking attempt.
 *
 * The attempt runs in three steps so no row lock is held across the
 * payment call: (1) a transaction prices the hold and records a PENDING
 * booking against it, (2) the charge, (3) a transaction that re-locks the
 * hold and the booking and applies exactly one of confirm, release or the
 * expired-after-payment refund path.
 */
@Injectable()
export class BookingsService {
  private readonly logger = new Logger(BookingsService.name);

  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    private readonly dataSource: DataSource,
    private readonly inventoryStore: SeatInventoryStore,
    private readonly paymentsService: PaymentsService,
    private readonly pricingService: PricingService,
    private readonly codeGenerator: BookingCodeGenerator,
    private readonly eventsPublisher: BookingEventsPublisher,
  ) {}

  async submitBooking(holdToken: string, paymentMethod: string, options: SubmitBookingOptions): Promise<BookingResult> {
    const idempotencyKey = options.idempotencyKey ?? `hold:${holdToken}`;

    this.logger.log(`Submitting booking for hold ${holdToken} (key ${idempotencyKey})`);

    const recorded = await this.bookingRepository.findOne({ where: { idempotencyKey } });
    if (recorded) {
      return this.replay(recorded, holdToken, options.actorId);
    }

    const opened = await retryWithBackoff(() => this.openBooking(holdToken, idempotencyKey, options), {
      maxAttempts: 5,
      initialDelayMs: 10,
      retryableErrors: [BookingCodeCollisionError],
      label: `booking code for hold ${holdToken}`,
    });

    if (opened.kind === 'SETTLED') {
      return opened.result;
    }

    const booking = opened.booking;
    const payment = await this.paymentsService.charge({
      amount: booking.finalAmount,
      currency: booking.currency,
      method: paymentMethod,
      idempotencyKey,
    });

    return this.completeBooking(booking.id, holdToken, payment);
  }

  async getBooking(id: string): Promise<BookingResponseDto> {
    const booking = await this.bookingRepository.findOne({ where: { id } });

    if (!booking) {
      throw new NotFoundException(`Booking ${id} not found`);
    }

    return toBookingResponse(booking);
  }

  async getBookingByCode(code: string): Promise<BookingResponseDto> {
    const booking = await this.bookingRepository.findOne({ where: { code } });

    if (!booking) {
      throw new NotFoundException(`Booking ${code} not found`);
    }

    return toBookingResponse(booking);
  }

  /**
   * Step 1: validate the hold, price it and record a PENDING booking that
   * the hold points at. Runs again on a booking-code collision.
   */
  private async openBooking(
    holdToken: string,
    idempotencyKey: string,
    options: SubmitBookingOptions,
  ): Promise<OpenedAttempt> {
    const now = new Date();
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const hold = await queryRunner.manager.findOne(Hold, {
        where: { token: holdToken },
        lock: { mode: 'pessimistic_write' },
      });

      if (!hold || hold.expiresAt.getTime() <= now.getTime()) {
        await queryRunner.commitTransaction();
        this.logger.warn(`Hold ${holdToken} is gone or expired`);
        return { kind: 'SETTLED', result: { outcome: 'HOLD_EXPIRED', refundIssued: false } };
      }
      if (hold.actorId !== options.actorId) {
        throw new ForbiddenException('Hold belongs to another actor');
      }
      if (hold.bookingId) {
        await queryRunner.commitTransaction();
        return { kind: 'SETTLED', result: { outcome: 'IN_PROGRESS', bookingId: hold.bookingId } };
      }

      const show = await queryRunner.manager.findOne(Show, { where: { id: hold.showId } });
      const seats = await queryRunner.manager.find(Seat, {
        where: { id: In(hold.seatIds) },
        order: { id: 'ASC' },
      });

      if (!show || seats.length !== hold.seatIds.length) {
        throw new InvariantViolationError('Hold references a show or seats that do not exist', {
          holdToken,
          showId: hold.showId,
        });
      }

      let promo: PromoCode | null = null;
      if (options.promoCode) {
        promo = await queryRunner.manager.findOne(PromoCode, {
          where: { code: options.promoCode },
          lock: { mode: 'pessimistic_write' },
        });
        this.pricingService.assertRedeemable(promo, options.promoCode, now);
      }

      const quote = this.pricingService.quote(show, seats, promo);
      const code = this.codeGenerator.next(now.getTime());

      const booking = queryRunner.manager.create(Booking, {
        code,
        idempotencyKey,
        showId: hold.showId,
        actorId: hold.actorId,
        holdToken,
        seatIds: hold.seatIds,
        seats: quote.lines,
        subtotal: quote.subtotal,
        fees: quote.fees,
        discount: quote.discount,
        finalAmount: quote.finalAmount,
        currency: quote.currency,
        promoCode: promo ? promo.code : null,
        status: BookingStatus.PENDING,
        paymentTransactionId: null,
        failureReason: null,
        refundAmount: null,
        confirmedAt: null,
        cancelledAt: null,
      });

      let saved: Booking;
      try {
        saved = await queryRunner.manager.save(Booking, booking);
      } catch (error) {
        if (isUniqueViolation(error, BOOKING_CODE_CONSTRAINT)) {
          throw new BookingCodeCollisionError(code);
        }
        throw error;
      }

      if (promo) {
        // Reserved here under the row lock; handed back if the booking never confirms.
        await queryRunner.manager.increment(PromoCode, { code: promo.code }, 'redemptions', 1);
      }

      hold.bookingId = saved.id;
      await queryRunner.manager.save(Hold, hold);

      await queryRunner.commitTransaction();

      this.logger.log(`Booking ${saved.id} (${saved.code}) pending payment of ${saved.finalAmount} ${saved.currency}`);
      return { kind: 'OPENED', booking: saved };
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }

      if (isUniqueViolation(error, BOOKING_IDEMPOTENCY_CONSTRAINT)) {
        // A concurrent submit with the same key recorded its attempt first.
        const winner = await this.bookingRepository.findOne({ where: { idempotencyKey } });
        if (winner) {
          return { kind: 'SETTLED', result: this.replay(winner, holdToken, options.actorId) };
        }
      }

      if (!(error instanceof BookingCodeCollisionError)) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        const errorStack = error instanceof Error ? error.stack : undefined;
        this.logger.error(`Failed to open booking for hold ${holdToken}: ${errorMessage}`, errorStack);
      }
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Step 3: apply the payment outcome. Exactly one of confirm, release on
   * failure, or refund-after-expiry runs, under locks on the hold and the
   * booking.
   */
  private async completeBooking(bookingId: string, holdToken: string, payment: PaymentOutcome): Promise<BookingResult> {
    const now = new Date();
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const hold = await queryRunner.manager.findOne(Hold, {
        where: { token: holdToken },
        lock: { mode: 'pessimistic_write' },
      });
      const booking = await queryRunner.manager.findOne(Booking, {
        where: { id: bookingId },
        lock: { mode: 'pessimistic_write' },
      });

      if (!booking) {
        throw new InvariantViolationError('Pending booking vanished during payment', { bookingId, holdToken });
      }

      let released = false;
      let result: BookingResult;

      switch (payment.outcome) {
        case 'SUCCESS': {
          if (
            hold === null ||
            hold.expiresAt.getTime() <= now.getTime() ||
            booking.status !== BookingStatus.PENDING
          ) {
            released = await this.releaseIfHeld(booking, hold, queryRunner.manager);
            if (booking.status === BookingStatus.PENDING) {
              booking.transitionTo(BookingStatus.EXPIRED);
            }
            booking.paymentTransactionId = payment.transactionId;
            booking.refundAmount = booking.finalAmount;
            booking.failureReason = 'HOLD_EXPIRED';
            await queryRunner.manager.save(Booking, booking);
            await this.returnPromoRedemption(booking, queryRunner.manager);
            result = { outcome: 'HOLD_EXPIRED', refundIssued: true, bookingId: booking.id };
            break;
          }

          const finalized = await this.inventoryStore.finalize(
            booking.showId,
            booking.seatIds,
            holdToken,
            booking.id,
            queryRunner.manager,
          );
          if (finalized.status !== 'OK') {
            throw new InvariantViolationError(`Live hold could not be finalized (${finalized.status})`, {
              bookingId,
              holdToken,
            });
          }

          booking.transitionTo(BookingStatus.CONFIRMED);
          booking.paymentTransactionId = payment.transactionId;
          booking.confirmedAt = now;
          await queryRunner.manager.save(Booking, booking);
          await queryRunner.manager.delete(Hold, { id: hold.id });

          result = { outcome: 'CONFIRMED', booking: toBookingResponse(booking) };
          break;
        }
        case 'FAILURE':
        case 'TIMEOUT': {
          const reason = payment.outcome === 'FAILURE' ? payment.reason : PAYMENT_TIMEOUT;

          released = await this.releaseIfHeld(booking, hold, queryRunner.manager);
          if (booking.status === BookingStatus.PENDING) {
            booking.transitionTo(BookingStatus.CANCELLED);
            booking.failureReason = reason;
            booking.cancelledAt = now;
            await queryRunner.manager.save(Booking, booking);
          }
          await this.returnPromoRedemption(booking, queryRunner.manager);

          result = { outcome: 'PAYMENT_FAILED', reason, bookingId: booking.id };
          break;
        }
        default:
          return assertNever(payment);
      }

      await queryRunner.commitTransaction();

      this.announce(result, booking, released);
      this.logger.log(`Booking ${booking.id} settled as ${result.outcome}`);

      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to complete booking ${bookingId}: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Returns the seats still held under the booking's token and drops the
   * hold row. The sweep may have done both already.
   */
  private async releaseIfHeld(
    booking: Booking,
    hold: Hold | null,
    manager: EntityManager,
  ): Promise<boolean> {
    if (!hold) {
      return false;
    }

    const released = await this.inventoryStore.release(booking.showId, booking.seatIds, booking.holdToken, manager);
    await manager.delete(Hold, { id: hold.id });

    return released.status === 'OK';
  }

  private async returnPromoRedemption(booking: Booking, manager: EntityManager): Promise<void> {
    if (booking.promoCode) {
      await manager.decrement(PromoCode, { code: booking.promoCode }, 'redemptions', 1);
    }
  }

  private announce(result: BookingResult, booking: Booking, released: boolean): void {
    const base = {
      showId: booking.showId,
      seatIds: booking.seatIds,
      bookingId: booking.id,
      bookingCode: booking.code,
      holdToken: booking.holdToken,
      actorId: booking.actorId,
    };

    if (released) {
      this.eventsPublisher.publish(BookingEventPattern.SEATS_RELEASED, {
        ...base,
        reason: result.outcome === 'PAYMENT_FAILED' ? result.reason : 'HOLD_EXPIRED',
      });
    }

    switch (result.outcome) {
      case 'CONFIRMED':
        this.eventsPublisher.publish(BookingEventPattern.SEATS_BOOKED, {
          ...base,
          paymentTransactionId: booking.paymentTransactionId ?? undefined,
        });
        return;
      case 'HOLD_EXPIRED':
        this.eventsPublisher.publish(BookingEventPattern.BOOKING_EXPIRED, {
          ...base,
          reason: 'HOLD_EXPIRED',
          refundAmount: booking.refundAmount ?? undefined,
          currency: booking.currency,
          paymentTransactionId: booking.paymentTransactionId ?? undefined,
        });
        return;
      case 'PAYMENT_FAILED':
        // The gateway may still settle a timed-out charge; void it by key.
        if (result.reason === PAYMENT_TIMEOUT) {
          this.eventsPublisher.publish(BookingEventPattern.PAYMENT_TIMED_OUT, {
            ...base,
            reason: PAYMENT_TIMEOUT,
            currency: booking.currency,
            chargeIdempotencyKey: booking.idempotencyKey,
          });
        }
        return;
      case 'IN_PROGRESS':
        return;
      default:
        assertNever(result);
    }
  }

  /**
   * Outcome of an attempt already recorded under an idempotency key. Never
   * charges again.
   */
  private replay(booking: Booking, holdToken: string, actorId: string): BookingResult {
    if (booking.actorId !== actorId) {
      throw new ForbiddenException('Idempotency key belongs to another actor');
    }
    if (booking.holdToken !== holdToken) {
      throw new BadRequestException('Idempotency key was already used for another hold');
    }

    this.logger.log(`Idempotent submit: booking ${booking.id} is ${booking.status}`);

    switch (booking.status) {
      case BookingStatus.PENDING:
        return { outcome: 'IN_PROGRESS', bookingId: booking.id };
      case BookingStatus.CONFIRMED:
        return { outcome: 'CONFIRMED', booking: toBookingResponse(booking) };
      case BookingStatus.CANCELLED:
        // Cancelled after confirmation: the submit itself confirmed.
        return booking.failureReason
          ? { outcome: 'PAYMENT_FAILED', reason: booking.failureReason, bookingId: booking.id }
          : { outcome: 'CONFIRMED', booking: toBookingResponse(booking) };
      case BookingStatus.EXPIRED:
        return {
          outcome: 'HOLD_EXPIRED',
          refundIssued: booking.paymentTransactionId !== null,
          bookingId: booking.id,
        };
      default:
        return assertNever(booking.status);
    }
  }
}
