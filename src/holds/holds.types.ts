import { HoldResponseDto } from '../dto/hold.dto';
import { Hold } from '../entities';

export type HoldResult = { status: 'HELD'; hold: HoldResponseDto } | { status: 'CONFLICT'; seatIds: string[] };

export function toHoldResponse(hold: Hold): HoldResponseDto {
  return {
    token: hold.token,
    showId: hold.showId,
    seatIds: hold.seatIds,
    actorId: hold.actorId,
    expiresAt: hold.expiresAt,
    extensionCount: hold.extensionCount,
  };
}
