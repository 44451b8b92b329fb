import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { randomUUID } from 'node:crypto';
import { ShowsService } from './shows.service';
import { SeatInventoryStore } from '../inventory/seat-inventory.store';
import { Screen, Seat, SeatState, SeatStatus, SeatTier, Show } from '../entities';
import { CreateScreenDto } from '../dto/show.dto';
import { InMemoryDatabase } from '../../test/support/in-memory-data-source';
import { createBookingDatabase } from '../../test/support/booking-database';

describe('ShowsService', () => {
  let service: ShowsService;
  let store: SeatInventoryStore;
  let db: InMemoryDatabase;

  const now = new Date('2026-03-01T12:00:00.000Z');
  const layout: CreateScreenDto = {
    name: 'Sala 1',
    rows: [
      { row: 'A', seats: 3 },
      { row: 'B', seats: 2, tier: SeatTier.PREMIUM, priceDelta: 4.5 },
    ],
  };

  const createShowOn = async (screenId: string) =>
    service.createShow(
      { movieTitle: 'Avatar 3', screenId, scheduledAt: '2026-03-05T20:00:00.000Z', basePrice: 10 },
      now,
    );

  beforeEach(async () => {
    db = createBookingDatabase();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ShowsService,
        SeatInventoryStore,
        { provide: DataSource, useValue: db.dataSource },
        { provide: getRepositoryToken(Screen), useValue: db.getRepository(Screen) },
        { provide: getRepositoryToken(Seat), useValue: db.getRepository(Seat) },
        { provide: getRepositoryToken(Show), useValue: db.getRepository(Show) },
        { provide: getRepositoryToken(SeatState), useValue: db.getRepository(SeatState) },
      ],
    }).compile();

    service = module.get<ShowsService>(ShowsService);
    store = module.get<SeatInventoryStore>(SeatInventoryStore);

    for (const logger of [service['logger'], store['logger']]) {
      jest.spyOn(logger, 'log').mockImplementation();
      jest.spyOn(logger, 'error').mockImplementation();
    }
  });

  describe('createScreen', () => {
    it('should lay out the seats row by row with their tiers', async () => {
      const screen = await service.createScreen(layout);

      expect(screen.name).toBe('Sala 1');
      expect(screen.totalSeats).toBe(5);
      expect(screen.seats.map((seat) => seat.label)).toEqual(['A1', 'A2', 'A3', 'B1', 'B2']);
      expect(screen.seats[3]).toMatchObject({ row: 'B', number: 1, tier: SeatTier.PREMIUM, priceDelta: 4.5 });
      expect(screen.seats[0]).toMatchObject({ tier: SeatTier.STANDARD, priceDelta: 0 });
      expect(db.rows(Seat)).toHaveLength(5);
    });

    it('should reject a layout that repeats a row', async () => {
      await expect(
        service.createScreen({ name: 'Sala 2', rows: [{ row: 'A', seats: 2 }, { row: 'A', seats: 2 }] }),
      ).rejects.toThrow(BadRequestException);
      expect(db.rows(Screen)).toHaveLength(0);
    });

    it('should reject a duplicate screen name and keep no stray seats', async () => {
      await service.createScreen(layout);

      await expect(service.createScreen(layout)).rejects.toThrow(ConflictException);
      expect(db.rows(Screen)).toHaveLength(1);
      expect(db.rows(Seat)).toHaveLength(5);
    });
  });

  describe('createShow', () => {
    it('should create the show with one available seat state per seat', async () => {
      const screen = await service.createScreen(layout);

      const show = await createShowOn(screen.id);

      expect(show).toMatchObject({
        movieTitle: 'Avatar 3',
        screenId: screen.id,
        basePrice: 10,
        isActive: true,
        totalSeats: 5,
        bookedSeats: 0,
        availableSeats: 5,
      });
      expect(show.scheduledAt).toEqual(new Date('2026-03-05T20:00:00.000Z'));

      const states = db.rows(SeatState);
      expect(states).toHaveLength(5);
      expect(states.every((state) => state.showId === show.id && state.status === SeatStatus.AVAILABLE)).toBe(true);
    });

    it('should refuse a show in the past', async () => {
      const screen = await service.createScreen(layout);

      await expect(
        service.createShow({ movieTitle: 'Old', screenId: screen.id, scheduledAt: '2026-02-01T20:00:00.000Z', basePrice: 10 }, now),
      ).rejects.toThrow(BadRequestException);
      expect(db.rows(Show)).toHaveLength(0);
    });

    it('should throw NotFoundException for an unknown screen', async () => {
      await expect(createShowOn(randomUUID())).rejects.toThrow(NotFoundException);
    });

    it('should roll the show back when the seat states cannot be written', async () => {
      const screen = await service.createScreen(layout);
      db.failWhen((operation, entityName) => operation === 'insert' && entityName === 'SeatState');

      await expect(createShowOn(screen.id)).rejects.toThrow('Injected insert failure on SeatState');
      expect(db.rows(Show)).toHaveLength(0);
      expect(db.rows(SeatState)).toHaveLength(0);
    });
  });

  describe('getSeatMap', () => {
    it('should report each seat with its price and current state', async () => {
      const screen = await service.createScreen(layout);
      const show = await createShowOn(screen.id);
      const [a1, a2, , b1] = screen.seats;
      await store.reserve(show.id, [a2.id], randomUUID());

      const seatMap = await service.getSeatMap(show.id);

      expect(seatMap).toMatchObject({
        showId: show.id,
        movieTitle: 'Avatar 3',
        totalSeats: 5,
        bookedSeats: 0,
        heldSeats: 1,
        availableSeats: 4,
      });
      expect(seatMap.seats[0]).toEqual({
        seatId: a1.id,
        label: 'A1',
        row: 'A',
        number: 1,
        tier: SeatTier.STANDARD,
        price: 10,
        status: SeatStatus.AVAILABLE,
      });
      expect(seatMap.seats[1].status).toBe(SeatStatus.HELD);
      expect(seatMap.seats[3]).toMatchObject({ seatId: b1.id, price: 14.5 });
    });

    it('should throw NotFoundException for an unknown show', async () => {
      await expect(service.getSeatMap(randomUUID())).rejects.toThrow(NotFoundException);
    });
  });

  describe('getAllShows', () => {
    it('should list shows soonest first', async () => {
      const screen = await service.createScreen(layout);
      await service.createShow(
        { movieTitle: 'Late', screenId: screen.id, scheduledAt: '2026-03-09T20:00:00.000Z', basePrice: 10 },
        now,
      );
      await service.createShow(
        { movieTitle: 'Early', screenId: screen.id, scheduledAt: '2026-03-02T20:00:00.000Z', basePrice: 10 },
        now,
      );

      const shows = await service.getAllShows();

      expect(shows.map((show) => show.movieTitle)).toEqual(['Early', 'Late']);
    });
  });
});
