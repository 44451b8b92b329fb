import { Body, Controller, Get, HttpStatus, Param, ParseUUIDPipe, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { BookingsService } from './bookings.service';
import { BookingFailureResponseDto, BookingResponseDto, SubmitBookingDto } from '../dto/booking.dto';
import { assertNever } from '../common/errors';

@ApiTags('bookings')
@Controller('bookings')
export class BookingsController {
  constructor(private readonly bookingsService: BookingsService) {}

  @Post()
  @ApiOperation({ summary: 'Pagar um bloqueio e confirmar a reserva' })
  @ApiResponse({ status: 201, description: 'Reserva confirmada', type: BookingResponseDto })
  @ApiResponse({ status: 402, description: 'Pagamento recusado', type: BookingFailureResponseDto })
  @ApiResponse({ status: 409, description: 'Pagamento em andamento', type: BookingFailureResponseDto })
  @ApiResponse({ status: 410, description: 'Bloqueio expirado', type: BookingFailureResponseDto })
  @ApiResponse({ status: 400, description: 'Chave de idempotência já usada para outro bloqueio ou cupom inválido' })
  async submitBooking(
    @Body() submitBookingDto: SubmitBookingDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BookingResponseDto | BookingFailureResponseDto> {
    const result = await this.bookingsService.submitBooking(submitBookingDto.holdToken, submitBookingDto.paymentMethod, {
      actorId: submitBookingDto.actorId,
      promoCode: submitBookingDto.promoCode,
      idempotencyKey: submitBookingDto.idempotencyKey,
    });

    switch (result.outcome) {
      case 'CONFIRMED':
        res.status(HttpStatus.CREATED);
        return result.booking;
      case 'HOLD_EXPIRED':
        res.status(HttpStatus.GONE);
        return { outcome: result.outcome, bookingId: result.bookingId, refundIssued: result.refundIssued };
      case 'PAYMENT_FAILED':
        res.status(HttpStatus.PAYMENT_REQUIRED);
        return { outcome: result.outcome, bookingId: result.bookingId, reason: result.reason };
      case 'IN_PROGRESS':
        res.status(HttpStatus.CONFLICT);
        return { outcome: result.outcome, bookingId: result.bookingId };
      default:
        return assertNever(result);
    }
  }

  @Get('code/:code')
  @ApiOperation({ summary: 'Buscar reserva pelo código' })
  @ApiResponse({ status: 200, description: 'Reserva encontrada', type: BookingResponseDto })
  async getBookingByCode(@Param('code') code: string): Promise<BookingResponseDto> {
    return this.bookingsService.getBookingByCode(code);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Buscar reserva por ID' })
  @ApiResponse({ status: 200, description: 'Reserva encontrada', type: BookingResponseDto })
  @ApiResponse({ status: 404, description: 'Reserva não encontrada' })
  async getBooking(@Param('id', ParseUUIDPipe) id: string): Promise<BookingResponseDto> {
    return this.bookingsService.getBooking(id);
  }
}
