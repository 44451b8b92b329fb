import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Hold } from '../entities';
import { InventoryModule } from '../inventory/inventory.module';
import { EventsModule } from '../events/events.module';
import { HoldsController } from './holds.controller';
import { HoldsConsumer } from './holds.consumer';
import { HoldsService } from './holds.service';
import { HoldsSweeper } from './holds.sweeper';
import { HoldExpiryQueue } from './hold-expiry.queue';

@Module({
  imports: [TypeOrmModule.forFeature([Hold]), InventoryModule, EventsModule],
  controllers: [HoldsController, HoldsConsumer],
  providers: [HoldsService, HoldsSweeper, HoldExpiryQueue],
  exports: [HoldsService, HoldExpiryQueue],
})
export class HoldsModule {}
