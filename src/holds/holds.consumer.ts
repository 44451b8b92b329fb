import { Controller, Logger, OnModuleDestroy } from '@nestjs/common';
import { Ctx, EventPattern, Payload, RmqContext } from '@nestjs/microservices';
import { HoldsService } from './holds.service';
import { BatchProcessor } from '../utils/batch-processor.util';
import { rmqHandles } from '../utils/rmq-context.util';

export interface HoldExpiryMessage {
  holdToken: string;
}

/**
 * Consumes delayed expiry messages from the DLX process queue in batches.
 * Relies on HoldsService.expireHold being idempotent: a message for a hold
 * that was booked, released or already swept is a no-op.
 */
@Controller()
export class HoldsConsumer implements OnModuleDestroy {
  private readonly logger = new Logger(HoldsConsumer.name);
  private batchProcessor: BatchProcessor<HoldExpiryMessage> | null = null;

  constructor(private readonly holdsService: HoldsService) {}

  async onModuleDestroy() {
    if (this.batchProcessor) {
      await this.batchProcessor.stop();
    }
    this.logger.log('HoldsConsumer shut down gracefully');
  }

  @EventPattern('hold.expire')
  async handleHoldExpire(@Payload() data: HoldExpiryMessage, @Ctx() context: RmqContext): Promise<void> {
    const { channel, message } = rmqHandles(context);

    if (!this.batchProcessor) {
      this.batchProcessor = new BatchProcessor<HoldExpiryMessage>(channel, (items) => this.expireBatch(items), {
        batchSize: 10,
        flushIntervalMs: 2000,
      });
      this.logger.log('Batch processor initialized for hold.expire events');
    }

    await this.batchProcessor.addMessage(data, message);
  }

  async expireBatch(items: Array<{ data: HoldExpiryMessage }>): Promise<void> {
    const results = await Promise.allSettled(items.map((item) => this.holdsService.expireHold(item.data.holdToken)));

    const failed = results.filter((result) => result.status === 'rejected').length;
    const expired = results.filter((result) => result.status === 'fulfilled' && result.value).length;

    if (failed > 0) {
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          const errorMessage = result.reason instanceof Error ? result.reason.message : 'Unknown error';
          this.logger.error(`Failed to expire hold ${items[index].data.holdToken}: ${errorMessage}`);
        }
      });
      throw new Error(`Batch processing had ${failed} failures`);
    }

    this.logger.log(`Batch completed: ${expired} of ${items.length} holds expired`);
  }
}
