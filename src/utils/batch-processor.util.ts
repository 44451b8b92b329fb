import { Logger } from '@nestjs/common';
import { Message } from 'amqplib';

export interface BatchMessage<T, M = Message> {
  data: T;
  message: M;
}

export interface BatchProcessorOptions {
  batchSize: number;
  flushIntervalMs: number;
}

export interface AckChannel<M = Message> {
  ack(message: M): void;
  nack(message: M, allUpTo?: boolean, requeue?: boolean): void;
}

/**
 * Accumulates RabbitMQ messages and hands them to `processFn` in batches.
 * A batch is acked as a whole on success and nacked (requeued) as a whole
 * when `processFn` throws.
 */
export class BatchProcessor<T, M = Message> {
  private readonly logger = new Logger(BatchProcessor.name);
  private batch: BatchMessage<T, M>[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private processing = false;
  private batchNumber = 0;

  constructor(
    private readonly channel: AckChannel<M>,
    private readonly processFn: (items: BatchMessage<T, M>[]) => Promise<void>,
    private readonly options: BatchProcessorOptions,
  ) {
    this.startFlushTimer();
  }

  get pending(): number {
    return this.batch.length;
  }

  async addMessage(data: T, message: M): Promise<void> {
    this.batch.push({ data, message });

    this.logger.debug(`Message added to batch. Current size: ${this.batch.length}/${this.options.batchSize}`);

    if (this.batch.length >= this.options.batchSize) {
      await this.flush('batch size reached');
    }
  }

  async flush(reason: string): Promise<void> {
    if (this.processing || this.batch.length === 0) {
      return;
    }

    this.processing = true;
    const currentBatch = [...this.batch];
    this.batch = [];
    this.batchNumber++;

    const batchId = this.batchNumber;

    try {
      this.logger.log(`Processing batch #${batchId} with ${currentBatch.length} messages (reason: ${reason})`);

      const startTime = Date.now();
      await this.processFn(currentBatch);
      const duration = Date.now() - startTime;

      for (const item of currentBatch) {
        this.channel.ack(item.message);
      }

      this.logger.log(`Batch #${batchId} processed in ${duration}ms (${currentBatch.length} messages)`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Batch #${batchId} processing failed: ${errorMessage}`,
        error instanceof Error ? error.stack : undefined,
      );

      for (const item of currentBatch) {
        this.channel.nack(item.message, false, true);
      }
    } finally {
      this.processing = false;
    }
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      if (this.batch.length > 0) {
        this.flush('flush interval').catch((error: unknown) => {
          this.logger.error('Error during scheduled flush', error instanceof Error ? error.stack : undefined);
        });
      }
    }, this.options.flushIntervalMs);
  }

  async stop(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    await this.flush('shutdown');
    this.logger.log('BatchProcessor stopped');
  }
}
