import { BookingStatus } from '../entities';
import { BookingResponseDto } from '../dto/booking.dto';

export type CancellationResult =
  | { outcome: 'CANCELLED'; booking: BookingResponseDto; refundAmount: number; refundPercent: number }
  | { outcome: 'TOO_LATE_TO_CANCEL'; minutesToShow: number; cutoffMinutes: number }
  | { outcome: 'NOT_CANCELLABLE'; status: BookingStatus };
