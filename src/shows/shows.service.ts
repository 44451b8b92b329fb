import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Decimal } from 'decimal.js';
import { Screen, Seat, SeatState, SeatStatus, SeatTier, Show } from '../entities';
import { SeatInventoryStore } from '../inventory/seat-inventory.store';
import { CreateScreenDto, CreateShowDto, ScreenResponseDto, ShowResponseDto } from '../dto/show.dto';
import { SeatMapDto, SeatMapSeatDto } from '../dto/availability.dto';
import { isUniqueViolation } from '../common/errors';

@Injectable()
export class ShowsService {
  private readonly logger = new Logger(ShowsService.name);

  constructor(
    @InjectRepository(Screen)
    private readonly screenRepository: Repository<Screen>,
    @InjectRepository(Seat)
    private readonly seatRepository: Repository<Seat>,
    @InjectRepository(Show)
    private readonly showRepository: Repository<Show>,
    private readonly dataSource: DataSource,
    private readonly inventoryStore: SeatInventoryStore,
  ) {}

  async createScreen(createScreenDto: CreateScreenDto): Promise<ScreenResponseDto> {
    const rows = createScreenDto.rows.map((layout) => layout.row);
    if (new Set(rows).size !== rows.length) {
      throw new BadRequestException('Each row may appear only once in a screen layout');
    }

    this.logger.log(`Creating screen: ${createScreenDto.name}`);

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const screen = await queryRunner.manager.save(
        Screen,
        queryRunner.manager.create(Screen, { name: createScreenDto.name }),
      );

      const seats = createScreenDto.rows.flatMap((layout) =>
        Array.from({ length: layout.seats }, (_, index) =>
          queryRunner.manager.create(Seat, {
            screenId: screen.id,
            row: layout.row,
            number: index + 1,
            label: `${layout.row}${index + 1}`,
            tier: layout.tier ?? SeatTier.STANDARD,
            priceDelta: layout.priceDelta ?? 0,
          }),
        ),
      );
      const savedSeats = await queryRunner.manager.save(Seat, seats);

      await queryRunner.commitTransaction();

      this.logger.log(`Screen created: ${screen.id} with ${savedSeats.length} seats`);

      return toScreenResponse(screen, savedSeats);
    } catch (error) {
      await queryRunner.rollbackTransaction();

      if (isUniqueViolation(error)) {
        throw new ConflictException(`Screen ${createScreenDto.name} already exists`);
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to create screen: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  async getScreen(screenId: string): Promise<ScreenResponseDto> {
    const screen = await this.screenRepository.findOne({ where: { id: screenId } });

    if (!screen) {
      throw new NotFoundException(`Screen ${screenId} not found`);
    }

    return toScreenResponse(screen, await this.seatsOf(screenId));
  }

  /**
   * Schedules a show on a screen and materialises one AVAILABLE seat state
   * per seat, in the same transaction.
   */
  async createShow(createShowDto: CreateShowDto, now = new Date()): Promise<ShowResponseDto> {
    const scheduledAt = new Date(createShowDto.scheduledAt);
    if (scheduledAt.getTime() <= now.getTime()) {
      throw new BadRequestException('Shows must be scheduled in the future');
    }

    const screen = await this.screenRepository.findOne({ where: { id: createShowDto.screenId } });
    if (!screen) {
      throw new NotFoundException(`Screen ${createShowDto.screenId} not found`);
    }

    const seats = await this.seatsOf(screen.id);
    if (seats.length === 0) {
      throw new BadRequestException(`Screen ${screen.id} has no seats`);
    }

    this.logger.log(`Creating show: ${createShowDto.movieTitle} on screen ${screen.name}`);

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const show = await queryRunner.manager.save(
        Show,
        queryRunner.manager.create(Show, {
          movieTitle: createShowDto.movieTitle,
          screenId: screen.id,
          scheduledAt,
          basePrice: createShowDto.basePrice,
          totalSeats: seats.length,
          bookedSeats: 0,
          isActive: true,
        }),
      );

      await queryRunner.manager.save(
        SeatState,
        seats.map((seat) =>
          queryRunner.manager.create(SeatState, {
            showId: show.id,
            seatId: seat.id,
            status: SeatStatus.AVAILABLE,
            holdToken: null,
            bookingId: null,
          }),
        ),
      );

      await queryRunner.commitTransaction();

      this.logger.log(`Show created: ${show.id} with ${seats.length} seats`);

      return toShowResponse(show);
    } catch (error) {
      await queryRunner.rollbackTransaction();
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Failed to create show: ${errorMessage}`, errorStack);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  async getAllShows(): Promise<ShowResponseDto[]> {
    const shows = await this.showRepository.find({ order: { scheduledAt: 'ASC' } });
    return shows.map(toShowResponse);
  }

  async getShow(showId: string): Promise<ShowResponseDto> {
    return toShowResponse(await this.findShow(showId));
  }

  /**
   * Current state of every seat of a show. Clients treat this as ground
   * truth and re-fetch it after reconnecting to the availability feed.
   */
  async getSeatMap(showId: string): Promise<SeatMapDto> {
    this.logger.log(`Getting seat map for show: ${showId}`);

    const show = await this.findShow(showId);
    const seats = await this.seatsOf(show.screenId);
    const states = new Map(
      (await this.inventoryStore.snapshot(showId)).map((state) => [state.seatId, state.status]),
    );
    const basePrice = new Decimal(show.basePrice);

    const seatMap: SeatMapSeatDto[] = seats.map((seat) => ({
      seatId: seat.id,
      label: seat.label,
      row: seat.row,
      number: seat.number,
      tier: seat.tier,
      price: basePrice.plus(seat.priceDelta).toDecimalPlaces(2).toNumber(),
      status: states.get(seat.id) ?? SeatStatus.AVAILABLE,
    }));

    const countOf = (status: SeatStatus) => seatMap.filter((seat) => seat.status === status).length;

    return {
      showId: show.id,
      movieTitle: show.movieTitle,
      scheduledAt: show.scheduledAt,
      totalSeats: show.totalSeats,
      bookedSeats: countOf(SeatStatus.BOOKED),
      heldSeats: countOf(SeatStatus.HELD),
      availableSeats: countOf(SeatStatus.AVAILABLE),
      seats: seatMap,
    };
  }

  private async findShow(showId: string): Promise<Show> {
    const show = await this.showRepository.findOne({ where: { id: showId } });

    if (!show) {
      throw new NotFoundException(`Show ${showId} not found`);
    }

    return show;
  }

  private seatsOf(screenId: string): Promise<Seat[]> {
    return this.seatRepository.find({
      where: { screenId },
      order: { row: 'ASC', number: 'ASC' },
    });
  }
}

function toScreenResponse(screen: Screen, seats: Seat[]): ScreenResponseDto {
  return {
    id: screen.id,
    name: screen.name,
    totalSeats: seats.length,
    seats: seats.map((seat) => ({
      id: seat.id,
      label: seat.label,
      row: seat.row,
      number: seat.number,
      tier: seat.tier,
      priceDelta: seat.priceDelta,
    })),
  };
}

function toShowResponse(show: Show): ShowResponseDto {
  return {
    id: show.id,
    movieTitle: show.movieTitle,
    screenId: show.screenId,
    scheduledAt: show.scheduledAt,
    basePrice: show.basePrice,
    isActive: show.isActive,
    totalSeats: show.totalSeats,
    bookedSeats: show.bookedSeats,
    availableSeats: show.totalSeats - show.bookedSeats,
    createdAt: show.createdAt,
  };
}
