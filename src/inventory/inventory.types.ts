import { SeatStatus } from '../entities';

export type ReserveResult =
  | { status: 'OK' }
  | { status: 'CONFLICT'; seatIds: string[] }
  | { status: 'NOT_FOUND'; seatIds: string[] };

export type ReleaseResult = { status: 'OK' } | { status: 'NOT_FOUND' };

export type FinalizeResult = { status: 'OK' } | { status: 'EXPIRED' } | { status: 'NOT_FOUND' };

export interface SeatStateView {
  seatId: string;
  status: SeatStatus;
}
