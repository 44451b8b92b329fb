import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { HoldsService } from './holds.service';
import { CreateHoldDto, HoldActorDto, HoldResponseDto, SeatConflictResponseDto } from '../dto/hold.dto';
import { assertNever } from '../common/errors';

@ApiTags('holds')
@Controller('holds')
export class HoldsController {
  constructor(private readonly holdsService: HoldsService) {}

  @Post()
  @ApiOperation({ summary: 'Bloquear assentos antes do pagamento' })
  @ApiResponse({ status: 201, description: 'Assentos bloqueados', type: HoldResponseDto })
  @ApiResponse({ status: 409, description: 'Assentos já ocupados', type: SeatConflictResponseDto })
  async createHold(
    @Body() createHoldDto: CreateHoldDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<HoldResponseDto | SeatConflictResponseDto> {
    const result = await this.holdsService.createHold(createHoldDto.showId, createHoldDto.seatIds, createHoldDto.actorId);

    switch (result.status) {
      case 'HELD':
        res.status(HttpStatus.CREATED);
        return result.hold;
      case 'CONFLICT':
        res.status(HttpStatus.CONFLICT);
        return { status: 'CONFLICT', seatIds: result.seatIds };
      default:
        return assertNever(result);
    }
  }

  @Get(':token')
  @ApiOperation({ summary: 'Consultar um bloqueio' })
  @ApiResponse({ status: 200, description: 'Bloqueio encontrado', type: HoldResponseDto })
  async getHold(@Param('token', ParseUUIDPipe) token: string): Promise<HoldResponseDto> {
    return this.holdsService.getHold(token);
  }

  @Post(':token/release')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Liberar os assentos de um bloqueio' })
  @ApiResponse({ status: 204, description: 'Bloqueio liberado' })
  async releaseHold(@Param('token', ParseUUIDPipe) token: string, @Body() body: HoldActorDto): Promise<void> {
    await this.holdsService.releaseHold(token, body.actorId);
  }

  @Post(':token/extend')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Estender o prazo de um bloqueio' })
  @ApiResponse({ status: 200, description: 'Bloqueio estendido', type: HoldResponseDto })
  async extendHold(@Param('token', ParseUUIDPipe) token: string, @Body() body: HoldActorDto): Promise<HoldResponseDto> {
    return this.holdsService.extendHold(token, body.actorId);
  }
}
