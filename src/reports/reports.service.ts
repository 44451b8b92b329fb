import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Decimal } from 'decimal.js';
import { Booking, BookingStatus, SeatStatus, Show } from '../entities';
import { SeatInventoryStore } from '../inventory/seat-inventory.store';
import { ActorHistoryDto, BookingHistoryEntryDto, ShowSummaryDto } from '../dto/report.dto';

/**
 * Read-only views over bookings and show counters. Never goes through the
 * orchestrator and never locks.
 */
@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    @InjectRepository(Show)
    private readonly showRepository: Repository<Show>,
    private readonly inventoryStore: SeatInventoryStore,
  ) {}

  async getActorHistory(actorId: string): Promise<ActorHistoryDto> {
    this.logger.log(`Getting booking history for actor: ${actorId}`);

    const bookings = await this.bookingRepository.find({
      where: { actorId, status: In([BookingStatus.CONFIRMED, BookingStatus.CANCELLED, BookingStatus.EXPIRED]) },
      order: { createdAt: 'DESC' },
    });

    const showIds = [...new Set(bookings.map((booking) => booking.showId))];
    const shows = new Map(
      (showIds.length > 0 ? await this.showRepository.find({ where: { id: In(showIds) } }) : []).map((show) => [
        show.id,
        show,
      ]),
    );

    const entries: BookingHistoryEntryDto[] = bookings.map((booking) => {
      const show = shows.get(booking.showId);
      return {
        bookingId: booking.id,
        code: booking.code,
        showId: booking.showId,
        movieTitle: show ? show.movieTitle : 'Unknown show',
        scheduledAt: show ? show.scheduledAt : booking.createdAt,
        seatLabels: booking.seats.map((line) => line.label),
        finalAmount: booking.finalAmount,
        currency: booking.currency,
        status: booking.status,
        refundAmount: booking.refundAmount,
        createdAt: booking.createdAt,
      };
    });

    const confirmed = bookings.filter((booking) => booking.status === BookingStatus.CONFIRMED);

    return {
      actorId,
      bookings: entries,
      confirmedBookings: confirmed.length,
      totalSpent: sum(confirmed.map((booking) => booking.finalAmount)),
      totalRefunded: sum(bookings.map((booking) => booking.refundAmount ?? 0)),
    };
  }

  async getShowSummary(showId: string): Promise<ShowSummaryDto> {
    this.logger.log(`Getting summary for show: ${showId}`);

    const show = await this.showRepository.findOne({ where: { id: showId } });
    if (!show) {
      throw new NotFoundException(`Show ${showId} not found`);
    }

    const states = await this.inventoryStore.snapshot(showId);
    const bookings = await this.bookingRepository.find({
      where: { showId, status: In([BookingStatus.CONFIRMED, BookingStatus.CANCELLED]) },
    });

    const confirmed = bookings.filter((booking) => booking.status === BookingStatus.CONFIRMED);
    const cancelled = bookings.filter((booking) => booking.status === BookingStatus.CANCELLED);
    const countOf = (status: SeatStatus) => states.filter((state) => state.status === status).length;

    return {
      showId: show.id,
      movieTitle: show.movieTitle,
      scheduledAt: show.scheduledAt,
      totalSeats: show.totalSeats,
      bookedSeats: show.bookedSeats,
      heldSeats: countOf(SeatStatus.HELD),
      availableSeats: countOf(SeatStatus.AVAILABLE),
      confirmedBookings: confirmed.length,
      cancelledBookings: cancelled.length,
      confirmedRevenue: sum(confirmed.map((booking) => booking.finalAmount)),
      refundedAmount: sum(cancelled.map((booking) => booking.refundAmount ?? 0)),
    };
  }
}

function sum(amounts: number[]): number {
  return amounts.reduce((total, amount) => total.plus(amount), new Decimal(0)).toNumber();
}
