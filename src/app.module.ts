import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { AppController } from './app.controller';
import databaseConfig from './config/database.config';
import rabbitmqConfig from './config/rabbitmq.config';
import appConfig from './config/app.config';
import bookingConfig from './config/booking.config';
import { validate } from './config/env.validation';
import { Booking, Hold, PromoCode, Screen, Seat, SeatState, Show } from './entities';
import { InvariantViolationFilter } from './common/invariant-violation.filter';
import { InventoryModule } from './inventory/inventory.module';
import { HoldsModule } from './holds/holds.module';
import { BookingsModule } from './bookings/bookings.module';
import { CancellationsModule } from './cancellations/cancellations.module';
import { ShowsModule } from './shows/shows.module';
import { ReportsModule } from './reports/reports.module';
import { EventsModule } from './events/events.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [databaseConfig, rabbitmqConfig, appConfig, bookingConfig],
      validate,
    }),
    ThrottlerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => [
        {
          ttl: config.get<number>('app.rateLimitTtl', 60) * 1000, // Convert to milliseconds
          limit: config.get<number>('app.rateLimitMax', 100),
        },
      ],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.username'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.database'),
        entities: [Screen, Seat, Show, SeatState, Hold, Booking, PromoCode],
        synchronize: configService.get('app.nodeEnv') === 'development' || configService.get('app.nodeEnv') === 'test',
        logging: configService.get('app.nodeEnv') === 'development',
        dropSchema: configService.get('app.nodeEnv') === 'test',
      }),
      inject: [ConfigService],
    }),
    ScheduleModule.forRoot(),
    InventoryModule,
    EventsModule,
    ShowsModule,
    HoldsModule,
    BookingsModule,
    CancellationsModule,
    ReportsModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: InvariantViolationFilter,
    },
  ],
})
export class AppModule {}
