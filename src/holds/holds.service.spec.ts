import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { BadRequestException, ForbiddenException, GoneException, NotFoundException } from '@nestjs/common';
import { HoldsService } from './holds.service';
import { HoldExpiryQueue } from './hold-expiry.queue';
import { SeatInventoryStore } from '../inventory/seat-inventory.store';
import { BookingEventsPublisher } from '../events/booking-events.publisher';
import { BookingEventPattern } from '../events/booking-events';
import { Booking, BookingStatus, Hold, SeatState, SeatStatus } from '../entities';
import { InMemoryDatabase } from '../../test/support/in-memory-data-source';
import { createBookingDatabase, seatStatuses, seedShow } from '../../test/support/booking-database';
import { configStub } from '../../test/support/config-stub';

describe('HoldsService', () => {
  let service: HoldsService;
  let db: InMemoryDatabase;
  let publisher: { publish: jest.Mock };
  let expiryQueue: { schedule: jest.Mock };

  const now = new Date('2026-03-01T12:00:00.000Z');
  const minutes = (n: number) => new Date(now.getTime() + n * 60 * 1000);

  const createHeld = async (seatIds: string[], actorId = 'user-x') => {
    const result = await service.createHold('show-1', seatIds, actorId, now);
    if (result.status !== 'HELD') {
      throw new Error(`expected HELD, got ${result.status}`);
    }
    return result.hold;
  };

  beforeEach(async () => {
    db = createBookingDatabase();
    seedShow(db, { scheduledAt: new Date('2026-03-05T20:00:00.000Z') });
    publisher = { publish: jest.fn() };
    expiryQueue = { schedule: jest.fn().mockReturnValue(true) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HoldsService,
        SeatInventoryStore,
        { provide: DataSource, useValue: db.dataSource },
        { provide: getRepositoryToken(Hold), useValue: db.getRepository(Hold) },
        { provide: getRepositoryToken(SeatState), useValue: db.getRepository(SeatState) },
        { provide: ConfigService, useValue: configStub({ 'booking.maxSeatsPerHold': 3, 'booking.sweepBatchSize': 2 }) },
        { provide: BookingEventsPublisher, useValue: publisher },
        { provide: HoldExpiryQueue, useValue: expiryQueue },
      ],
    }).compile();

    service = module.get<HoldsService>(HoldsService);
    const store = module.get<SeatInventoryStore>(SeatInventoryStore);

    for (const logger of [service['logger'], store['logger']]) {
      jest.spyOn(logger, 'log').mockImplementation();
      jest.spyOn(logger, 'warn').mockImplementation();
      jest.spyOn(logger, 'error').mockImplementation();
      jest.spyOn(logger, 'debug').mockImplementation();
    }
  });

  describe('createHold', () => {
    it('should hold the seats for ten minutes and announce it', async () => {
      const hold = await createHeld(['seat-A2', 'seat-A1']);

      expect(hold.seatIds).toEqual(['seat-A1', 'seat-A2']);
      expect(hold.expiresAt).toEqual(minutes(10));
      expect(hold.extensionCount).toBe(0);
      expect(seatStatuses(db)).toEqual({
        A1: SeatStatus.HELD,
        A2: SeatStatus.HELD,
        A3: SeatStatus.AVAILABLE,
        A4: SeatStatus.AVAILABLE,
      });
      expect(db.rows(Hold)).toHaveLength(1);
      expect(publisher.publish).toHaveBeenCalledWith(BookingEventPattern.SEATS_HELD, {
        showId: 'show-1',
        seatIds: ['seat-A1', 'seat-A2'],
        holdToken: hold.token,
        actorId: 'user-x',
      });
      expect(expiryQueue.schedule).toHaveBeenCalledWith(hold.token, 600_000);
    });

    it('should return CONFLICT with only the contested seats', async () => {
      await createHeld(['seat-A1', 'seat-A2']);
      publisher.publish.mockClear();

      const result = await service.createHold('show-1', ['seat-A2', 'seat-A3'], 'user-y', now);

      expect(result).toEqual({ status: 'CONFLICT', seatIds: ['seat-A2'] });
      expect(seatStatuses(db).A3).toBe(SeatStatus.AVAILABLE);
      expect(db.rows(Hold)).toHaveLength(1);
      expect(publisher.publish).not.toHaveBeenCalled();
    });

    it('should let exactly one of two racing overlapping holds win', async () => {
      const [x, y] = await Promise.all([
        service.createHold('show-1', ['seat-A1', 'seat-A2'], 'user-x', now),
        service.createHold('show-1', ['seat-A2', 'seat-A3'], 'user-y', now),
      ]);

      expect([x.status, y.status].sort()).toEqual(['CONFLICT', 'HELD']);
      expect(x.status === 'CONFLICT' ? x : y).toEqual({ status: 'CONFLICT', seatIds: ['seat-A2'] });
      expect(db.rows(Hold)).toHaveLength(1);
    });

    it('should collapse duplicate seat ids', async () => {
      const hold = await createHeld(['seat-A1', 'seat-A1']);

      expect(hold.seatIds).toEqual(['seat-A1']);
    });

    it('should refuse more seats than a hold may cover', async () => {
      await expect(
        service.createHold('show-1', ['seat-A1', 'seat-A2', 'seat-A3', 'seat-A4'], 'user-x', now),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('should refuse a show that already started', async () => {
      await expect(
        service.createHold('show-1', ['seat-A1'], 'user-x', new Date('2026-03-05T20:00:00.000Z')),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('should refuse an unknown show', async () => {
      await expect(service.createHold('show-9', ['seat-A1'], 'user-x', now)).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });

    it('should refuse seats that are not part of the show', async () => {
      await expect(service.createHold('show-1', ['seat-A1', 'seat-Z9'], 'user-x', now)).rejects.toBeInstanceOf(
        NotFoundException,
      );
      expect(seatStatuses(db).A1).toBe(SeatStatus.AVAILABLE);
    });

    it('should leave every seat available when recording the hold fails', async () => {
      db.failWhen((operation, entity) => operation === 'insert' && entity === 'Hold');

      await expect(service.createHold('show-1', ['seat-A1', 'seat-A2', 'seat-A3'], 'user-x', now)).rejects.toThrow(
        'Injected insert failure on Hold',
      );

      expect(seatStatuses(db)).toEqual({
        A1: SeatStatus.AVAILABLE,
        A2: SeatStatus.AVAILABLE,
        A3: SeatStatus.AVAILABLE,
        A4: SeatStatus.AVAILABLE,
      });
      expect(db.rows(Hold)).toHaveLength(0);
      expect(publisher.publish).not.toHaveBeenCalled();
    });
  });

  describe('releaseHold', () => {
    it('should free the seats and drop the hold', async () => {
      const hold = await createHeld(['seat-A1', 'seat-A2']);

      await service.releaseHold(hold.token, 'user-x');

      expect(seatStatuses(db).A1).toBe(SeatStatus.AVAILABLE);
      expect(seatStatuses(db).A2).toBe(SeatStatus.AVAILABLE);
      expect(db.rows(Hold)).toHaveLength(0);
      expect(publisher.publish).toHaveBeenLastCalledWith(BookingEventPattern.SEATS_RELEASED, {
        showId: 'show-1',
        seatIds: ['seat-A1', 'seat-A2'],
        holdToken: hold.token,
        actorId: 'user-x',
        reason: 'RELEASED',
      });
    });

    it('should refuse another actor', async () => {
      const hold = await createHeld(['seat-A1']);

      await expect(service.releaseHold(hold.token, 'user-y')).rejects.toBeInstanceOf(ForbiddenException);
      expect(seatStatuses(db).A1).toBe(SeatStatus.HELD);
    });

    it('should report an unknown token', async () => {
      await expect(service.releaseHold('missing-token', 'user-x')).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('extendHold', () => {
    it('should push the expiry out once', async () => {
      const hold = await createHeld(['seat-A1']);

      const extended = await service.extendHold(hold.token, 'user-x', minutes(5));

      expect(extended.expiresAt).toEqual(minutes(15));
      expect(extended.extensionCount).toBe(1);
      expect(expiryQueue.schedule).toHaveBeenLastCalledWith(hold.token, 600_000);

      await expect(service.extendHold(hold.token, 'user-x', minutes(6))).rejects.toBeInstanceOf(BadRequestException);
    });

    it('should refuse a lapsed hold', async () => {
      const hold = await createHeld(['seat-A1']);

      await expect(service.extendHold(hold.token, 'user-x', minutes(10))).rejects.toBeInstanceOf(GoneException);
    });

    it('should refuse another actor', async () => {
      const hold = await createHeld(['seat-A1']);

      await expect(service.extendHold(hold.token, 'user-y', minutes(1))).rejects.toBeInstanceOf(ForbiddenException);
    });
  });

  describe('expireHold', () => {
    it('should leave a live hold alone', async () => {
      const hold = await createHeld(['seat-A1']);

      await expect(service.expireHold(hold.token, minutes(9))).resolves.toBe(false);
      expect(seatStatuses(db).A1).toBe(SeatStatus.HELD);
    });

    it('should release a lapsed hold once', async () => {
      const hold = await createHeld(['seat-A1']);

      await expect(service.expireHold(hold.token, minutes(10))).resolves.toBe(true);
      await expect(service.expireHold(hold.token, minutes(10))).resolves.toBe(false);

      expect(seatStatuses(db).A1).toBe(SeatStatus.AVAILABLE);
      expect(publisher.publish).toHaveBeenLastCalledWith(
        BookingEventPattern.SEATS_RELEASED,
        expect.objectContaining({ reason: 'HOLD_EXPIRED', seatIds: ['seat-A1'] }),
      );
    });

    it('should expire a booking still awaiting payment on the hold', async () => {
      const hold = await createHeld(['seat-A1']);
      db.seed(Booking, [
        Object.assign(new Booking(), {
          id: 'booking-1',
          code: 'BKTEST',
          idempotencyKey: `hold:${hold.token}`,
          showId: 'show-1',
          actorId: 'user-x',
          holdToken: hold.token,
          seatIds: ['seat-A1'],
          seats: [],
          subtotal: 12,
          fees: 1.5,
          discount: 0,
          finalAmount: 13.5,
          currency: 'USD',
          promoCode: null,
          status: BookingStatus.PENDING,
          paymentTransactionId: null,
          failureReason: null,
          refundAmount: null,
          confirmedAt: null,
          cancelledAt: null,
        }),
      ]);
      const [row] = db.rows(Hold);
      db.seed(Hold, [{ ...row, bookingId: 'booking-1' }]);

      await service.expireHold(hold.token, minutes(11));

      const [booking] = db.rows(Booking);
      expect(booking.status).toBe(BookingStatus.EXPIRED);
      expect(booking.failureReason).toBe('HOLD_EXPIRED');
      expect(seatStatuses(db).A1).toBe(SeatStatus.AVAILABLE);
    });
  });

  describe('sweepExpired', () => {
    it('should release every lapsed hold and make the seats bookable again', async () => {
      await createHeld(['seat-A1', 'seat-A2'], 'user-x');
      await service.createHold('show-1', ['seat-A3'], 'user-z', minutes(5));

      const released = await service.sweepExpired(minutes(10));

      expect(released).toBe(1);
      expect(seatStatuses(db)).toEqual({
        A1: SeatStatus.AVAILABLE,
        A2: SeatStatus.AVAILABLE,
        A3: SeatStatus.HELD,
        A4: SeatStatus.AVAILABLE,
      });

      const retry = await service.createHold('show-1', ['seat-A2'], 'user-y', minutes(10));
      expect(retry.status).toBe('HELD');
    });

    it('should keep sweeping batches until nothing is due', async () => {
      await createHeld(['seat-A1'], 'user-x');
      await createHeld(['seat-A2'], 'user-y');
      await createHeld(['seat-A3'], 'user-z');

      const released = await service.sweepExpired(minutes(10));

      expect(released).toBe(3);
      expect(db.rows(Hold)).toHaveLength(0);
      expect(seatStatuses(db)).toEqual({
        A1: SeatStatus.AVAILABLE,
        A2: SeatStatus.AVAILABLE,
        A3: SeatStatus.AVAILABLE,
        A4: SeatStatus.AVAILABLE,
      });
    });

    it('should skip a hold that fails to expire and finish the rest', async () => {
      const failing = await createHeld(['seat-A1'], 'user-x');
      await createHeld(['seat-A2'], 'user-y');
      await createHeld(['seat-A3'], 'user-z');
      const expireHold = service.expireHold.bind(service);
      jest.spyOn(service, 'expireHold').mockImplementation(async (token, at) => {
        if (token === failing.token) {
          throw new Error('storage hiccup');
        }
        return expireHold(token, at);
      });

      const released = await service.sweepExpired(minutes(10));

      expect(released).toBe(2);
      expect(db.rows(Hold).map((hold) => hold.token)).toEqual([failing.token]);
      expect(seatStatuses(db).A1).toBe(SeatStatus.HELD);
    });

    it('should be a no-op when nothing is due', async () => {
      await createHeld(['seat-A1']);

      await expect(service.sweepExpired(minutes(1))).resolves.toBe(0);
    });
  });
});
