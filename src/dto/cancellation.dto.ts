import { IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { BookingStatus } from '../entities';
import { BookingResponseDto } from './booking.dto';

export class CancelBookingDto {
  @ApiProperty({ example: 'user123', description: 'ID do usuário que cancela' })
  @IsString()
  @MaxLength(255)
  actorId!: string;
}

export class CancellationResponseDto {
  @ApiProperty({ type: BookingResponseDto })
  booking!: BookingResponseDto;

  @ApiProperty({ description: 'Valor a ser estornado' })
  refundAmount!: number;

  @ApiProperty({ example: 100, description: 'Percentual estornado' })
  refundPercent!: number;
}

export class CancellationRejectedDto {
  @ApiProperty({ enum: ['TOO_LATE_TO_CANCEL', 'NOT_CANCELLABLE'] })
  outcome!: string;

  @ApiPropertyOptional({ enum: BookingStatus })
  status?: BookingStatus;

  @ApiPropertyOptional({ description: 'Minutos até a sessão' })
  minutesToShow?: number;

  @ApiPropertyOptional({ description: 'Prazo mínimo para cancelamento, em minutos' })
  cutoffMinutes?: number;
}

export class CancellationQuoteDto {
  @ApiProperty()
  bookingId!: string;

  @ApiProperty({ enum: BookingStatus })
  status!: BookingStatus;

  @ApiProperty({ description: 'Se a reserva pode ser cancelada agora' })
  cancellable!: boolean;

  @ApiProperty({ description: 'Estorno se cancelada agora' })
  refundAmount!: number;

  @ApiProperty()
  refundPercent!: number;

  @ApiProperty()
  minutesToShow!: number;

  @ApiProperty()
  currency!: string;
}
