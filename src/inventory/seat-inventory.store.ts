import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { SeatState, SeatStatus, Show } from '../entities';
import { InvariantViolationError } from '../common/errors';
import { FinalizeResult, ReleaseResult, ReserveResult, SeatStateView } from './inventory.types';

/**
 * Owns every write to `seat_states` and to the show booked-seat counter.
 *
 * Each operation locks the requested (show, seat) rows with
 * SELECT ... FOR UPDATE in ascending seat-id order, checks them, and then
 * moves the whole set in one conditional UPDATE, so a set transitions
 * together or not at all. Operations accept the caller's EntityManager to
 * join a wider transaction; without one they open their own.
 */
@Injectable()
export class SeatInventoryStore {
  private readonly logger = new Logger(SeatInventoryStore.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(SeatState)
    private readonly seatStateRepository: Repository<SeatState>,
  ) {}

  async reserve(showId: string, seatIds: string[], holdToken: string, manager?: EntityManager): Promise<ReserveResult> {
    const requested = normalizeSeatIds(seatIds);

    return this.withManager(manager, async (em) => {
      const states = await this.lockSeats(em, showId, requested);

      const missing = requested.filter((seatId) => !states.some((state) => state.seatId === seatId));
      if (missing.length > 0) {
        return { status: 'NOT_FOUND', seatIds: missing };
      }

      const taken = states.filter((state) => state.status !== SeatStatus.AVAILABLE).map((state) => state.seatId);
      if (taken.length > 0) {
        this.logger.warn(`Reserve conflict on show ${showId}: ${taken.join(', ')} already taken`);
        return { status: 'CONFLICT', seatIds: taken };
      }

      const result = await em.update(
        SeatState,
        { showId, seatId: In(requested), status: SeatStatus.AVAILABLE },
        { status: SeatStatus.HELD, holdToken, bookingId: null },
      );
      assertAffected(result.affected, requested.length, 'reserve', { showId, holdToken });

      this.logger.log(`Seats ${requested.join(', ')} on show ${showId} held under ${holdToken}`);
      return { status: 'OK' };
    });
  }

  async release(showId: string, seatIds: string[], holdToken: string, manager?: EntityManager): Promise<ReleaseResult> {
    const requested = normalizeSeatIds(seatIds);

    return this.withManager(manager, async (em) => {
      const states = await this.lockSeats(em, showId, requested);
      const held = states.filter((state) => state.status === SeatStatus.HELD && state.holdToken === holdToken);

      if (held.length === 0) {
        return { status: 'NOT_FOUND' };
      }
      if (held.length !== requested.length) {
        throw new InvariantViolationError('Hold covers only part of its seat set', {
          showId,
          holdToken,
          requested,
          held: held.map((state) => state.seatId),
        });
      }

      const result = await em.update(
        SeatState,
        { showId, seatId: In(requested), status: SeatStatus.HELD, holdToken },
        { status: SeatStatus.AVAILABLE, holdToken: null },
      );
      assertAffected(result.affected, requested.length, 'release', { showId, holdToken });

      this.logger.log(`Seats ${requested.join(', ')} on show ${showId} released from ${holdToken}`);
      return { status: 'OK' };
    });
  }

  /**
   * HELD -> BOOKED for every seat of the hold, and the show counter moves
   * in the same transaction.
   */
  async finalize(
    showId: string,
    seatIds: string[],
    holdToken: string,
    bookingId: string,
    manager?: EntityManager,
  ): Promise<FinalizeResult> {
    const requested = normalizeSeatIds(seatIds);

    return this.withManager(manager, async (em) => {
      const states = await this.lockSeats(em, showId, requested);
      if (states.length !== requested.length) {
        return { status: 'NOT_FOUND' };
      }

      const held = states.filter((state) => state.status === SeatStatus.HELD && state.holdToken === holdToken);
      if (held.length === 0) {
        return { status: 'EXPIRED' };
      }
      if (held.length !== requested.length) {
        throw new InvariantViolationError('Hold covers only part of its seat set at finalize', {
          showId,
          holdToken,
          requested,
          held: held.map((state) => state.seatId),
        });
      }

      const result = await em.update(
        SeatState,
        { showId, seatId: In(requested), status: SeatStatus.HELD, holdToken },
        { status: SeatStatus.BOOKED, holdToken: null, bookingId },
      );
      assertAffected(result.affected, requested.length, 'finalize', { showId, holdToken, bookingId });

      const counter = await em.increment(Show, { id: showId }, 'bookedSeats', requested.length);
      assertAffected(counter.affected, 1, 'finalize counter', { showId });

      this.logger.log(`Seats ${requested.join(', ')} on show ${showId} booked by ${bookingId}`);
      return { status: 'OK' };
    });
  }

  /**
   * BOOKED -> AVAILABLE for a cancelled booking. No hold is involved.
   */
  async releaseBooked(
    showId: string,
    seatIds: string[],
    bookingId: string,
    manager?: EntityManager,
  ): Promise<ReleaseResult> {
    const requested = normalizeSeatIds(seatIds);

    return this.withManager(manager, async (em) => {
      const states = await this.lockSeats(em, showId, requested);
      const booked = states.filter((state) => state.status === SeatStatus.BOOKED && state.bookingId === bookingId);

      if (booked.length === 0) {
        return { status: 'NOT_FOUND' };
      }
      if (booked.length !== requested.length) {
        throw new InvariantViolationError('Booking owns only part of its seat set', {
          showId,
          bookingId,
          requested,
          booked: booked.map((state) => state.seatId),
        });
      }

      const result = await em.update(
        SeatState,
        { showId, seatId: In(requested), status: SeatStatus.BOOKED, bookingId },
        { status: SeatStatus.AVAILABLE, bookingId: null },
      );
      assertAffected(result.affected, requested.length, 'releaseBooked', { showId, bookingId });

      const counter = await em.decrement(Show, { id: showId }, 'bookedSeats', requested.length);
      assertAffected(counter.affected, 1, 'releaseBooked counter', { showId });

      this.logger.log(`Seats ${requested.join(', ')} on show ${showId} returned from booking ${bookingId}`);
      return { status: 'OK' };
    });
  }

  async snapshot(showId: string): Promise<SeatStateView[]> {
    const states = await this.seatStateRepository.find({
      where: { showId },
      order: { seatId: 'ASC' },
    });

    return states.map((state) => ({ seatId: state.seatId, status: state.status }));
  }

  private lockSeats(em: EntityManager, showId: string, seatIds: string[]): Promise<SeatState[]> {
    // Ordered locking keeps overlapping seat sets from deadlocking.
    return em.find(SeatState, {
      where: { showId, seatId: In(seatIds) },
      order: { seatId: 'ASC' },
      lock: { mode: 'pessimistic_write' },
    });
  }

  private withManager<T>(manager: EntityManager | undefined, work: (em: EntityManager) => Promise<T>): Promise<T> {
    if (manager) {
      return work(manager);
    }
    return this.dataSource.transaction(work);
  }
}

export function normalizeSeatIds(seatIds: string[]): string[] {
  return [...new Set(seatIds)].sort();
}

function assertAffected(
  affected: number | null | undefined,
  expected: number,
  operation: string,
  context: Record<string, unknown>,
): void {
  if (affected !== expected) {
    throw new InvariantViolationError(`Seat ${operation} touched ${affected ?? 0} rows, expected ${expected}`, context);
  }
}
