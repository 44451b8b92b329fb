import { IsOptional, IsString, IsUUID, MaxLength, MinLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { BookingStatus, SeatTier } from '../entities';

export class SubmitBookingDto {
  @ApiProperty({ example: '9b2d3c1e-5f7a-4b8c-9d0e-1f2a3b4c5d6e', description: 'Token do bloqueio de assentos' })
  @IsUUID()
  holdToken!: string;

  @ApiProperty({ example: 'tok_visa', description: 'Método de pagamento tokenizado' })
  @IsString()
  @MinLength(1)
  paymentMethod!: string;

  @ApiProperty({ example: 'user123', description: 'ID do usuário' })
  @IsString()
  @MaxLength(255)
  actorId!: string;

  @ApiPropertyOptional({ example: 'WELCOME10', description: 'Código promocional' })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  promoCode?: string;

  @ApiPropertyOptional({
    example: 'checkout-7f3a',
    description: 'Chave de idempotência; padrão hold:<token>',
  })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  idempotencyKey?: string;
}

export class BookingSeatLineDto {
  @ApiProperty()
  seatId!: string;

  @ApiProperty({ example: 'A1' })
  label!: string;

  @ApiProperty({ enum: SeatTier })
  tier!: SeatTier;

  @ApiProperty({ description: 'Preço do assento no momento da compra' })
  price!: number;
}

export class BookingResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'BKLX2Q7F0A9KP3M' })
  code!: string;

  @ApiProperty()
  showId!: string;

  @ApiProperty()
  actorId!: string;

  @ApiProperty({ type: [String] })
  seatIds!: string[];

  @ApiProperty({ type: [BookingSeatLineDto] })
  seats!: BookingSeatLineDto[];

  @ApiProperty()
  subtotal!: number;

  @ApiProperty({ description: 'Taxa de conveniência' })
  fees!: number;

  @ApiProperty()
  discount!: number;

  @ApiProperty({ description: 'Valor cobrado' })
  finalAmount!: number;

  @ApiProperty({ example: 'USD' })
  currency!: string;

  @ApiProperty({ type: String, nullable: true })
  promoCode!: string | null;

  @ApiProperty({ enum: BookingStatus })
  status!: BookingStatus;

  @ApiProperty({ type: String, nullable: true })
  paymentTransactionId!: string | null;

  @ApiProperty({ type: String, nullable: true })
  failureReason!: string | null;

  @ApiProperty({ type: Number, nullable: true })
  refundAmount!: number | null;

  @ApiProperty({ type: Date, nullable: true })
  confirmedAt!: Date | null;

  @ApiProperty({ type: Date, nullable: true })
  cancelledAt!: Date | null;

  @ApiProperty()
  createdAt!: Date;
}

export class BookingFailureResponseDto {
  @ApiProperty({ example: 'PAYMENT_FAILED', enum: ['HOLD_EXPIRED', 'PAYMENT_FAILED', 'IN_PROGRESS'] })
  outcome!: string;

  @ApiPropertyOptional()
  bookingId?: string;

  @ApiPropertyOptional({ example: 'CARD_DECLINED' })
  reason?: string;

  @ApiPropertyOptional({ description: 'Cobrança estornada automaticamente' })
  refundIssued?: boolean;
}
