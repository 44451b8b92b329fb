import { ApiProperty } from '@nestjs/swagger';
import { BookingStatus } from '../entities';

export class BookingHistoryEntryDto {
  @ApiProperty()
  bookingId!: string;

  @ApiProperty()
  code!: string;

  @ApiProperty()
  showId!: string;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  scheduledAt!: Date;

  @ApiProperty({ type: [String], example: ['A1', 'A2'] })
  seatLabels!: string[];

  @ApiProperty()
  finalAmount!: number;

  @ApiProperty()
  currency!: string;

  @ApiProperty({ enum: BookingStatus })
  status!: BookingStatus;

  @ApiProperty({ type: Number, nullable: true })
  refundAmount!: number | null;

  @ApiProperty()
  createdAt!: Date;
}

export class ActorHistoryDto {
  @ApiProperty()
  actorId!: string;

  @ApiProperty({ type: [BookingHistoryEntryDto] })
  bookings!: BookingHistoryEntryDto[];

  @ApiProperty({ description: 'Reservas confirmadas' })
  confirmedBookings!: number;

  @ApiProperty({ description: 'Total pago em reservas confirmadas' })
  totalSpent!: number;

  @ApiProperty({ description: 'Total estornado' })
  totalRefunded!: number;
}

export class ShowSummaryDto {
  @ApiProperty()
  showId!: string;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  scheduledAt!: Date;

  @ApiProperty()
  totalSeats!: number;

  @ApiProperty()
  bookedSeats!: number;

  @ApiProperty()
  heldSeats!: number;

  @ApiProperty()
  availableSeats!: number;

  @ApiProperty()
  confirmedBookings!: number;

  @ApiProperty()
  cancelledBookings!: number;

  @ApiProperty({ description: 'Receita de reservas confirmadas' })
  confirmedRevenue!: number;

  @ApiProperty()
  refundedAmount!: number;
}
