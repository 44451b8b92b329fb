import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { HoldsService } from './holds.service';

export const HOLD_SWEEP_INTERVAL = 'hold-sweep';

/**
 * Runs HoldsService.sweepExpired on a fixed interval. This is the
 * authoritative expiry path; the delayed queue only gets there sooner.
 */
@Injectable()
export class HoldsSweeper implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(HoldsSweeper.name);
  private running = false;

  constructor(
    private readonly holdsService: HoldsService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit() {
    const intervalMs = this.configService.get<number>('booking.sweepIntervalMs', 30000);

    const interval = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error('Hold sweep crashed', error instanceof Error ? error.stack : undefined);
      });
    }, intervalMs);

    this.schedulerRegistry.addInterval(HOLD_SWEEP_INTERVAL, interval);
    this.logger.log(`Hold sweep scheduled every ${intervalMs}ms`);
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', HOLD_SWEEP_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(HOLD_SWEEP_INTERVAL);
    }
  }

  /**
   * One pass. Skipped while a previous pass is still running.
   */
  async sweep(now = new Date()): Promise<number> {
    if (this.running) {
      this.logger.debug('Previous sweep still running, skipping');
      return 0;
    }

    this.running = true;
    try {
      return await this.holdsService.sweepExpired(now);
    } catch (error) {
      this.logger.error('Error sweeping expired holds', error instanceof Error ? error.stack : undefined);
      return 0;
    } finally {
      this.running = false;
    }
  }
}
