import { Controller, Get, Param, ParseUUIDPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ReportsService } from './reports.service';
import { ActorHistoryDto, ShowSummaryDto } from '../dto/report.dto';

@ApiTags('reports')
@Controller('reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('actors/:actorId/bookings')
  @ApiOperation({ summary: 'Buscar histórico de reservas de um usuário' })
  @ApiResponse({ status: 200, description: 'Histórico de reservas', type: ActorHistoryDto })
  async getActorHistory(@Param('actorId') actorId: string): Promise<ActorHistoryDto> {
    return this.reportsService.getActorHistory(actorId);
  }

  @Get('shows/:id')
  @ApiOperation({ summary: 'Resumo de ocupação e receita de uma sessão' })
  @ApiResponse({ status: 200, description: 'Resumo da sessão', type: ShowSummaryDto })
  async getShowSummary(@Param('id', ParseUUIDPipe) id: string): Promise<ShowSummaryDto> {
    return this.reportsService.getShowSummary(id);
  }
}
