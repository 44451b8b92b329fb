import { Body, Controller, Get, HttpStatus, Param, ParseUUIDPipe, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { CancellationsService } from './cancellations.service';
import {
  CancelBookingDto,
  CancellationQuoteDto,
  CancellationRejectedDto,
  CancellationResponseDto,
} from '../dto/cancellation.dto';
import { assertNever } from '../common/errors';

@ApiTags('bookings')
@Controller('bookings')
export class CancellationsController {
  constructor(private readonly cancellationsService: CancellationsService) {}

  @Post(':id/cancel')
  @ApiOperation({ summary: 'Cancelar uma reserva confirmada' })
  @ApiResponse({ status: 200, description: 'Reserva cancelada', type: CancellationResponseDto })
  @ApiResponse({ status: 409, description: 'Reserva não pode ser cancelada', type: CancellationRejectedDto })
  @ApiResponse({ status: 422, description: 'Fora do prazo de cancelamento', type: CancellationRejectedDto })
  async cancelBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: CancelBookingDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<CancellationResponseDto | CancellationRejectedDto> {
    const result = await this.cancellationsService.cancelBooking(id, body.actorId);

    switch (result.outcome) {
      case 'CANCELLED':
        res.status(HttpStatus.OK);
        return { booking: result.booking, refundAmount: result.refundAmount, refundPercent: result.refundPercent };
      case 'TOO_LATE_TO_CANCEL':
        res.status(HttpStatus.UNPROCESSABLE_ENTITY);
        return { outcome: result.outcome, minutesToShow: result.minutesToShow, cutoffMinutes: result.cutoffMinutes };
      case 'NOT_CANCELLABLE':
        res.status(HttpStatus.CONFLICT);
        return { outcome: result.outcome, status: result.status };
      default:
        return assertNever(result);
    }
  }

  @Get(':id/cancellation-quote')
  @ApiOperation({ summary: 'Simular o estorno de um cancelamento' })
  @ApiResponse({ status: 200, description: 'Simulação de estorno', type: CancellationQuoteDto })
  async quoteCancellation(@Param('id', ParseUUIDPipe) id: string): Promise<CancellationQuoteDto> {
    return this.cancellationsService.quoteCancellation(id);
  }
}
