import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Booking, Hold, PromoCode, Seat, Show } from '../entities';
import { InventoryModule } from '../inventory/inventory.module';
import { EventsModule } from '../events/events.module';
import { PaymentsModule } from '../payments/payments.module';
import { BookingsController } from './bookings.controller';
import { BookingsService } from './bookings.service';
import { PricingService } from './pricing.service';
import { BookingCodeGenerator } from './booking-code.generator';

@Module({
  imports: [
    TypeOrmModule.forFeature([Booking, Hold, Show, Seat, PromoCode]),
    InventoryModule,
    EventsModule,
    PaymentsModule,
  ],
  controllers: [BookingsController],
  providers: [BookingsService, PricingService, BookingCodeGenerator],
  exports: [BookingsService],
})
export class BookingsModule {}
