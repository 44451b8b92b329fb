import { Logger, UsePipes, ValidationPipe } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
  WsException,
  WsResponse,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { WatchShowDto } from '../dto/availability.dto';
import { SeatEvent, seatStatusAfter } from './booking-events';
import { SeatStatus } from '../entities';

export interface SeatStateMessage {
  showId: string;
  seatIds: string[];
  status: SeatStatus;
  eventType: string;
  timestamp: string;
}

type RoomMember = Pick<Socket, 'join' | 'leave'>;

export function showRoom(showId: string): string {
  return `show:${showId}`;
}

/**
 * Pushes seat-state changes to viewers of a show's seat map. Best effort:
 * clients re-fetch GET /shows/:id/seat-map on reconnect.
 */
@WebSocketGateway({
  namespace: '/availability',
  cors: {
    origin: '*',
  },
})
@UsePipes(new ValidationPipe({ exceptionFactory: (errors) => new WsException(errors) }))
export class AvailabilityGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(AvailabilityGateway.name);

  @WebSocketServer()
  server!: Server;

  afterInit() {
    this.logger.log('AvailabilityGateway initialized');
  }

  handleConnection(client: Socket) {
    this.logger.debug(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: Socket) {
    this.logger.debug(`Client disconnected: ${client.id}`);
  }

  @SubscribeMessage('watch')
  async handleWatch(
    @ConnectedSocket() client: RoomMember,
    @MessageBody() body: WatchShowDto,
  ): Promise<WsResponse<{ showId: string }>> {
    await client.join(showRoom(body.showId));
    return { event: 'watching', data: { showId: body.showId } };
  }

  @SubscribeMessage('unwatch')
  async handleUnwatch(
    @ConnectedSocket() client: RoomMember,
    @MessageBody() body: WatchShowDto,
  ): Promise<WsResponse<{ showId: string }>> {
    await client.leave(showRoom(body.showId));
    return { event: 'unwatched', data: { showId: body.showId } };
  }

  /**
   * Fans a seat event out to the show's room. Never throws.
   */
  broadcast(event: SeatEvent): boolean {
    const status = seatStatusAfter(event.eventType);
    if (status === null || event.seatIds.length === 0) {
      return false;
    }

    const message: SeatStateMessage = {
      showId: event.showId,
      seatIds: event.seatIds,
      status,
      eventType: event.eventType,
      timestamp: event.timestamp,
    };

    try {
      this.server.to(showRoom(event.showId)).emit('seat-state', message);
      return true;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to broadcast ${event.eventType} for show ${event.showId}: ${errorMessage}`);
      return false;
    }
  }
}
