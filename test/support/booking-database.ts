import { InMemoryDatabase } from './in-memory-data-source';
import {
  Booking,
  BOOKING_CODE_CONSTRAINT,
  BOOKING_IDEMPOTENCY_CONSTRAINT,
  Hold,
  PromoCode,
  Screen,
  Seat,
  SeatState,
  SeatStatus,
  SeatTier,
  Show,
} from '../../src/entities';

export function createBookingDatabase(): InMemoryDatabase {
  return new InMemoryDatabase()
    .define(SeatState, { primaryKey: ['showId', 'seatId'] })
    .define(PromoCode, { primaryKey: ['code'] })
    .define(Screen, { unique: [{ name: 'UQ_screens_name', columns: ['name'] }] })
    .define(Seat, { unique: [{ name: 'UQ_seats_screen_label', columns: ['screenId', 'label'] }] })
    .define(Hold, { unique: [{ name: 'UQ_holds_token', columns: ['token'] }] })
    .define(Booking, {
      unique: [
        { name: BOOKING_CODE_CONSTRAINT, columns: ['code'] },
        { name: BOOKING_IDEMPOTENCY_CONSTRAINT, columns: ['idempotencyKey'] },
      ],
    });
}

export interface SeededShow {
  show: Show;
  seats: Record<string, Seat>;
}

export interface SeedShowOptions {
  showId?: string;
  labels?: string[];
  scheduledAt?: Date;
  basePrice?: number;
  premiumLabels?: string[];
}

/**
 * Seeds a screen, its seats and one show with every seat AVAILABLE.
 * Seat ids are `seat-<label>` so their sort order follows the labels.
 */
export function seedShow(db: InMemoryDatabase, options: SeedShowOptions = {}): SeededShow {
  const showId = options.showId ?? 'show-1';
  const labels = options.labels ?? ['A1', 'A2', 'A3', 'A4'];
  const premium = new Set(options.premiumLabels ?? []);
  const screenId = `screen-${showId}`;

  db.seed(Screen, [{ id: screenId, name: `Screen for ${showId}` }]);

  const seats: Record<string, Seat> = {};
  for (const label of labels) {
    const seat = Object.assign(new Seat(), {
      id: `seat-${label}`,
      screenId,
      row: label.charAt(0),
      number: Number(label.slice(1)),
      label,
      tier: premium.has(label) ? SeatTier.PREMIUM : SeatTier.STANDARD,
      priceDelta: premium.has(label) ? 5 : 0,
    });
    seats[label] = seat;
  }
  db.seed(Seat, Object.values(seats));

  const show = Object.assign(new Show(), {
    id: showId,
    movieTitle: 'The Test Picture',
    screenId,
    scheduledAt: options.scheduledAt ?? new Date(Date.now() + 3 * 24 * 60 * 60 * 1000),
    basePrice: options.basePrice ?? 12,
    totalSeats: labels.length,
    bookedSeats: 0,
    isActive: true,
  });
  db.seed(Show, [show]);

  db.seed(
    SeatState,
    Object.values(seats).map((seat) => ({
      showId,
      seatId: seat.id,
      status: SeatStatus.AVAILABLE,
      holdToken: null,
      bookingId: null,
    })),
  );

  return { show, seats };
}

export function seatStatuses(db: InMemoryDatabase, showId = 'show-1'): Record<string, SeatStatus> {
  return Object.fromEntries(
    db
      .rows(SeatState)
      .filter((state) => state.showId === showId)
      .map((state) => [state.seatId.replace('seat-', ''), state.status]),
  );
}
