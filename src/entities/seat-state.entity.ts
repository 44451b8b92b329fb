import { Entity, PrimaryColumn, Column, UpdateDateColumn, Index } from 'typeorm';

export enum SeatStatus {
  AVAILABLE = 'AVAILABLE',
  HELD = 'HELD',
  BOOKED = 'BOOKED',
}

/**
 * Authoritative status of one seat for one show. A row is HELD with a
 * holdToken, BOOKED with a bookingId, or AVAILABLE with neither.
 */
@Entity('seat_states')
@Index('IDX_seat_states_show_status', ['showId', 'status'])
@Index('IDX_seat_states_hold_token', ['holdToken'])
export class SeatState {
  @PrimaryColumn({ type: 'uuid' })
  showId!: string;

  @PrimaryColumn({ type: 'uuid' })
  seatId!: string;

  @Column({ type: 'enum', enum: SeatStatus, default: SeatStatus.AVAILABLE })
  status!: SeatStatus;

  @Column({ type: 'uuid', nullable: true })
  holdToken!: string | null;

  @Column({ type: 'uuid', nullable: true })
  bookingId!: string | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
