import { NotificationsService } from './notifications.service';
import { BookingEventPattern } from '../events/booking-events';

describe('NotificationsService', () => {
  let service: NotificationsService;

  const base = {
    showId: 'show-1',
    seatIds: ['seat-A1', 'seat-A2'],
    bookingId: 'booking-1',
    bookingCode: 'BKABC',
    actorId: 'user-x',
    timestamp: '2026-01-01T00:00:00.000Z',
  };

  beforeEach(() => {
    service = new NotificationsService();
    jest.spyOn(service['logger'], 'log').mockImplementation();
  });

  it('should record a confirmation for booked seats', () => {
    const record = service.notify({ ...base, eventType: BookingEventPattern.SEATS_BOOKED });

    expect(record).toEqual({
      template: 'booking-confirmed',
      actorId: 'user-x',
      bookingId: 'booking-1',
      bookingCode: 'BKABC',
      showId: 'show-1',
      seatIds: ['seat-A1', 'seat-A2'],
      refundAmount: undefined,
      currency: undefined,
    });
  });

  it('should carry the refund on a cancellation', () => {
    const record = service.notify({
      ...base,
      eventType: BookingEventPattern.BOOKING_CANCELLED,
      refundAmount: 13.5,
      currency: 'USD',
    });

    expect(record?.template).toBe('booking-cancelled');
    expect(record?.refundAmount).toBe(13.5);
  });

  it('should ignore events customers are not told about', () => {
    expect(service.notify({ ...base, eventType: BookingEventPattern.SEATS_HELD })).toBeNull();
  });

  it('should ignore events without a booking', () => {
    expect(
      service.notify({ ...base, bookingId: undefined, eventType: BookingEventPattern.SEATS_BOOKED }),
    ).toBeNull();
  });
});
