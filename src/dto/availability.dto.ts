import { IsUUID } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { SeatStatus, SeatTier } from '../entities';

export class WatchShowDto {
  @ApiProperty({ example: '550e8400-e29b-41d4-a716-446655440000', description: 'ID da sessão a acompanhar' })
  @IsUUID()
  showId!: string;
}

export class SeatMapSeatDto {
  @ApiProperty()
  seatId!: string;

  @ApiProperty({ example: 'A1' })
  label!: string;

  @ApiProperty()
  row!: string;

  @ApiProperty()
  number!: number;

  @ApiProperty({ enum: SeatTier })
  tier!: SeatTier;

  @ApiProperty({ description: 'Preço do assento (base + adicional da categoria)' })
  price!: number;

  @ApiProperty({ enum: SeatStatus })
  status!: SeatStatus;
}

export class SeatMapDto {
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

  @ApiProperty({ type: [SeatMapSeatDto] })
  seats!: SeatMapSeatDto[];
}
