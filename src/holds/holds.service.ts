import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  GoneException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, LessThanOrEqual, Repository } from 'typeorm';
import { randomUUID } from 'node:crypto';
import { Booking, BookingStatus, Hold, Show } from '../entities';
import { SeatInventoryStore, normalizeSeatIds } from '../inventory/seat-inventory.store';
import { BookingEventsPublisher } from '../events/booking-events.publisher';
import { BookingEventPattern } from '../events/booking-events';
import { HoldExpiryQueue } from './hold-expiry.queue';
import { HoldResult, toHoldResponse } from './holds.types';
import { HoldResponseDto } from '../dto/hold.dto';
import { InvariantViolationError, assertNever } from '../common/errors';

@Injectable()
export class HoldsService {
  private readonly logger = new Logger(HoldsService.name);
  private readonly holdTtlSeconds: number;
  private readonly holdExtensionSeconds: number;
  private readonly maxHoldExtensions: number;
  private readonly maxSeatsPerHold: number;
  private readonly sweepBatchSize: number;

  constructor(
    @InjectRepository(Hold)
    private readonly holdRepository: Repository<Hold>,
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
    private readonly inventoryStore: SeatInventoryStore,
    private readonly eventsPublisher: BookingEventsPublisher,
    private readonly expiryQueue: HoldExpiryQueue,
  ) {
    this.holdTtlSeconds = this.configService.get<number>('booking.holdTtlSeconds', 600);
    this.holdExtensionSeconds = this.configService.get<number>('booking.holdExtensionSeconds', 300);
    this.maxHoldExtensions = this.configService.get<number>('booking.maxHoldExtensions', 1);
    this.maxSeatsPerHold = this.configService.get<number>('booking.maxSeatsPerHold', 10);
    this.sweepBatchSize = this.configService.get<number>('booking.sweepBatchSize', 200);
  }

  /**
   * Reserves every requested seat under a fresh token and records the hold,
   * in one transaction. A taken seat is a routine CONFLICT, not an error.
   */
  async createHold(showId: string, seatIds: string[], actorId: string, now = new Date()): Promise<HoldResult> {
    const requested = normalizeSeatIds(seatIds);

    if (requested.length === 0) {
      throw new BadRequestException('At least one seat is required');
    }
    if (requested.length > this.maxSeatsPerHold) {
      throw new BadRequestException(`A hold may cover at most ${this.maxSeatsPerHold} seats`);
    }

    this.logger.log(`Creating hold for actor ${actorId} on show ${showId} - Seats: ${requested.join(', ')}`);

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const show = await queryRunner.manager.findOne(Show, { where: { id: showId } });

      if (!show || !show.isActive) {
        throw new NotFoundException(`Show ${showId} not found`);
      }
      if (show.scheduledAt.getTime() <= now.getTime()) {
        throw new BadRequestException(`Show ${showId} has already started`);
      }

      const token = randomUUID();
      const reserved = await this.inventoryStore.reserve(showId, requested, token, queryRunner.manager);

      switch (reserved.status) {
        case 'CONFLICT':
          await queryRunner.rollbackTransaction();
          this.logger.warn(`Hold for actor ${actorId} conflicted on ${reserved.seatIds.join(', ')}`);
          return { status: 'CONFLICT', seatIds: reserved.seatIds };
        case 'NOT_FOUND':
          throw new NotFoundException(`Seats ${reserved.seatIds.join(', ')} do not exist for show ${showId}`);
        case 'OK':
          break;
        default:
          return assertNever(reserved);
      }

      const hold = queryRunner.manager.create(Hold, {
        token,
        showId,
        seatIds: requested,
        actorId,
        expiresAt: new Date(now.getTime() + this.holdTtlSeconds * 1000),
        extensionCount: 0,
        bookingId: null,
      });
      const saved = await queryRunner.manager.save(Hold, hold);

      await queryRunner.commitTransaction();

      this.eventsPublisher.publish(BookingEventPattern.SEATS_HELD, {
        showId,
        seatIds: requested,
        holdToken: token,
        actorId,
      });
      this.expiryQueue.schedule(token, saved.expiresAt.getTime() - now.getTime());

      this.logger.log(`Hold ${token} created, expires at ${saved.expiresAt.toISOString()}`);

      return { status: 'HELD', hold: toHoldResponse(saved) };
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to create hold: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  async getHold(token: string): Promise<HoldResponseDto> {
    const hold = await this.holdRepository.findOne({ where: { token } });

    if (!hold) {
      throw new NotFoundException(`Hold ${token} not found`);
    }

    return toHoldResponse(hold);
  }

  /**
   * Gives the seats back before the window ends. Only the actor who
   * created the hold may release it, and not while its payment is running.
   */
  async releaseHold(token: string, actorId: string): Promise<void> {
    this.logger.log(`Releasing hold ${token}`);

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const hold = await queryRunner.manager.findOne(Hold, {
        where: { token },
        lock: { mode: 'pessimistic_write' },
      });

      if (!hold) {
        throw new NotFoundException(`Hold ${token} not found`);
      }
      if (hold.actorId !== actorId) {
        throw new ForbiddenException('Hold belongs to another actor');
      }
      if (hold.bookingId) {
        throw new ConflictException('Hold has a booking awaiting payment');
      }

      await this.releaseSeats(hold, queryRunner.manager);
      await queryRunner.manager.delete(Hold, { id: hold.id });

      await queryRunner.commitTransaction();

      this.eventsPublisher.publish(BookingEventPattern.SEATS_RELEASED, {
        showId: hold.showId,
        seatIds: hold.seatIds,
        holdToken: token,
        actorId,
        reason: 'RELEASED',
      });

      this.logger.log(`Hold ${token} released, seats ${hold.seatIds.join(', ')} available`);
    } catch (error) {
      await queryRunner.rollbackTransaction();
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to release hold ${token}: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  async extendHold(token: string, actorId: string, now = new Date()): Promise<HoldResponseDto> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const hold = await queryRunner.manager.findOne(Hold, {
        where: { token },
        lock: { mode: 'pessimistic_write' },
      });

      if (!hold) {
        throw new NotFoundException(`Hold ${token} not found`);
      }
      if (hold.actorId !== actorId) {
        throw new ForbiddenException('Hold belongs to another actor');
      }
      if (hold.expiresAt.getTime() <= now.getTime()) {
        throw new GoneException(`Hold ${token} has expired`);
      }
      if (hold.extensionCount >= this.maxHoldExtensions) {
        throw new BadRequestException(`Hold ${token} cannot be extended again`);
      }

      hold.expiresAt = new Date(hold.expiresAt.getTime() + this.holdExtensionSeconds * 1000);
      hold.extensionCount += 1;
      const saved = await queryRunner.manager.save(Hold, hold);

      await queryRunner.commitTransaction();

      this.expiryQueue.schedule(token, saved.expiresAt.getTime() - now.getTime());
      this.logger.log(`Hold ${token} extended to ${saved.expiresAt.toISOString()}`);

      return toHoldResponse(saved);
    } catch (error) {
      await queryRunner.rollbackTransaction();
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to extend hold ${token}: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Releases a hold whose window has elapsed. Safe to call any number of
   * times and from both the sweep and the delayed queue: a missing or still
   * live hold is a no-op. A booking still awaiting payment on the hold is
   * marked EXPIRED; the orchestrator refunds it if the charge went through.
   *
   * @returns true when this call released the hold
   */
  async expireHold(token: string, now = new Date()): Promise<boolean> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const hold = await queryRunner.manager.findOne(Hold, {
        where: { token },
        lock: { mode: 'pessimistic_write' },
      });

      if (!hold) {
        await queryRunner.commitTransaction();
        return false;
      }

      if (hold.expiresAt.getTime() > now.getTime()) {
        this.logger.debug(`Hold ${token} not yet expired, skipping`);
        await queryRunner.commitTransaction();
        return false;
      }

      if (hold.bookingId) {
        const booking = await queryRunner.manager.findOne(Booking, {
          where: { id: hold.bookingId },
          lock: { mode: 'pessimistic_write' },
        });

        if (booking && booking.status === BookingStatus.PENDING) {
          booking.transitionTo(BookingStatus.EXPIRED);
          booking.failureReason = 'HOLD_EXPIRED';
          await queryRunner.manager.save(Booking, booking);
          this.logger.warn(`Booking ${booking.id} expired while awaiting payment`);
        }
      }

      await this.releaseSeats(hold, queryRunner.manager);
      await queryRunner.manager.delete(Hold, { id: hold.id });

      await queryRunner.commitTransaction();

      this.eventsPublisher.publish(BookingEventPattern.SEATS_RELEASED, {
        showId: hold.showId,
        seatIds: hold.seatIds,
        holdToken: token,
        actorId: hold.actorId,
        reason: 'HOLD_EXPIRED',
      });

      this.logger.log(`Hold ${token} expired, seats ${hold.seatIds.join(', ')} released`);
      return true;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to expire hold ${token}: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Expires every hold whose window ended at or before `now`, oldest
   * first, a batch at a time until nothing is due. A hold that fails to
   * expire is logged and skipped for the rest of the pass.
   *
   * @returns number of holds released
   */
  async sweepExpired(now = new Date()): Promise<number> {
    const skipped = new Set<string>();
    let released = 0;
    let examined = 0;

    for (;;) {
      const due = await this.holdRepository.find({
        where: { expiresAt: LessThanOrEqual(now) },
        order: { expiresAt: 'ASC' },
        take: this.sweepBatchSize + skipped.size,
      });
      const batch = due.filter((hold) => !skipped.has(hold.token)).slice(0, this.sweepBatchSize);

      if (batch.length === 0) {
        break;
      }

      for (const hold of batch) {
        examined++;
        try {
          if (await this.expireHold(hold.token, now)) {
            released++;
          }
        } catch (error) {
          skipped.add(hold.token);
          const errorMessage = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error(`Sweep could not expire hold ${hold.token}: ${errorMessage}`);
        }
      }
    }

    if (examined > 0) {
      this.logger.log(`Sweep released ${released} of ${examined} expired holds`);
    }
    return released;
  }

  private async releaseSeats(hold: Hold, manager: EntityManager): Promise<void> {
    const released = await this.inventoryStore.release(hold.showId, hold.seatIds, hold.token, manager);

    if (released.status === 'NOT_FOUND') {
      throw new InvariantViolationError('Hold row exists but its seats are not held', {
        holdToken: hold.token,
        showId: hold.showId,
      });
    }
  }
}
