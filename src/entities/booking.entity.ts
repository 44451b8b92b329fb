import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { decimalTransformer } from './decimal.transformer';
import { SeatTier } from './seat.entity';
import { InvariantViolationError } from '../common/errors';

export enum BookingStatus {
  PENDING = 'PENDING',
  CONFIRMED = 'CONFIRMED',
  CANCELLED = 'CANCELLED',
  EXPIRED = 'EXPIRED',
}

export const BOOKING_CODE_CONSTRAINT = 'UQ_bookings_code';
export const BOOKING_IDEMPOTENCY_CONSTRAINT = 'UQ_bookings_idempotency_key';

const ALLOWED_TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  [BookingStatus.PENDING]: [BookingStatus.CONFIRMED, BookingStatus.CANCELLED, BookingStatus.EXPIRED],
  [BookingStatus.CONFIRMED]: [BookingStatus.CANCELLED],
  [BookingStatus.CANCELLED]: [],
  [BookingStatus.EXPIRED]: [],
};

export interface BookingSeatLine {
  seatId: string;
  label: string;
  tier: SeatTier;
  price: number;
}

@Entity('bookings')
@Index(BOOKING_CODE_CONSTRAINT, ['code'], { unique: true })
@Index(BOOKING_IDEMPOTENCY_CONSTRAINT, ['idempotencyKey'], { unique: true })
@Index('IDX_bookings_actor', ['actorId'])
@Index('IDX_bookings_show_status', ['showId', 'status'])
export class Booking {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 32 })
  code!: string;

  @Column({ length: 255 })
  idempotencyKey!: string;

  @Column({ type: 'uuid' })
  showId!: string;

  @Column()
  actorId!: string;

  @Column({ type: 'uuid' })
  holdToken!: string;

  @Column({ type: 'uuid', array: true })
  seatIds!: string[];

  // Per-seat price captured when the booking was priced.
  @Column({ type: 'jsonb' })
  seats!: BookingSeatLine[];

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  subtotal!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  fees!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  discount!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  finalAmount!: number;

  @Column({ length: 3 })
  currency!: string;

  @Column({ type: 'varchar', nullable: true })
  promoCode!: string | null;

  @Column({ type: 'enum', enum: BookingStatus, default: BookingStatus.PENDING })
  status!: BookingStatus;

  @Column({ type: 'varchar', nullable: true })
  paymentTransactionId!: string | null;

  @Column({ type: 'varchar', nullable: true })
  failureReason!: string | null;

  @Column({ type: 'decimal', precision: 10, scale: 2, nullable: true, transformer: decimalTransformer })
  refundAmount!: number | null;

  @Column({ type: 'timestamptz', nullable: true })
  confirmedAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  cancelledAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  /**
   * Moves the booking to `next`, refusing any edge not in the lifecycle.
   */
  transitionTo(next: BookingStatus): void {
    if (!ALLOWED_TRANSITIONS[this.status].includes(next)) {
      throw new InvariantViolationError(`Illegal booking transition ${this.status} -> ${next}`, {
        bookingId: this.id,
      });
    }
    this.status = next;
  }
}
