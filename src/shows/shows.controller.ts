import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ShowsService } from './shows.service';
import { CreateScreenDto, CreateShowDto, ScreenResponseDto, ShowResponseDto } from '../dto/show.dto';
import { SeatMapDto } from '../dto/availability.dto';

@ApiTags('shows')
@Controller()
export class ShowsController {
  constructor(private readonly showsService: ShowsService) {}

  @Post('screens')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Cadastrar uma sala com seu layout de assentos' })
  @ApiResponse({ status: 201, description: 'Sala criada com sucesso', type: ScreenResponseDto })
  @ApiResponse({ status: 409, description: 'Já existe uma sala com esse nome' })
  async createScreen(@Body() createScreenDto: CreateScreenDto): Promise<ScreenResponseDto> {
    return this.showsService.createScreen(createScreenDto);
  }

  @Get('screens/:id')
  @ApiOperation({ summary: 'Consultar uma sala' })
  @ApiResponse({ status: 200, description: 'Sala encontrada', type: ScreenResponseDto })
  async getScreen(@Param('id', ParseUUIDPipe) id: string): Promise<ScreenResponseDto> {
    return this.showsService.getScreen(id);
  }

  @Post('shows')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Criar uma nova sessão de cinema' })
  @ApiResponse({ status: 201, description: 'Sessão criada com sucesso', type: ShowResponseDto })
  async createShow(@Body() createShowDto: CreateShowDto): Promise<ShowResponseDto> {
    return this.showsService.createShow(createShowDto);
  }

  @Get('shows')
  @ApiOperation({ summary: 'Listar todas as sessões' })
  @ApiResponse({ status: 200, description: 'Lista de sessões', type: [ShowResponseDto] })
  async getAllShows(): Promise<ShowResponseDto[]> {
    return this.showsService.getAllShows();
  }

  @Get('shows/:id')
  @ApiOperation({ summary: 'Consultar uma sessão' })
  @ApiResponse({ status: 200, description: 'Sessão encontrada', type: ShowResponseDto })
  async getShow(@Param('id', ParseUUIDPipe) id: string): Promise<ShowResponseDto> {
    return this.showsService.getShow(id);
  }

  @Get('shows/:id/seat-map')
  @ApiOperation({ summary: 'Mapa de assentos de uma sessão' })
  @ApiResponse({ status: 200, description: 'Estado atual de cada assento', type: SeatMapDto })
  async getSeatMap(@Param('id', ParseUUIDPipe) id: string): Promise<SeatMapDto> {
    return this.showsService.getSeatMap(id);
  }
}
