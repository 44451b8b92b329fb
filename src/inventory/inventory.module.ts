import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SeatState, Show } from '../entities';
import { SeatInventoryStore } from './seat-inventory.store';

@Module({
  imports: [TypeOrmModule.forFeature([SeatState, Show])],
  providers: [SeatInventoryStore],
  exports: [SeatInventoryStore],
})
export class InventoryModule {}
