import type { Logger } from '../monitoring';
import { calculateBackoffDelay, sleep } from '../retry';
import type { RunHandle, RunQueue } from './run-queue';

/**
 * What to do with the queue item once an attempt returns
 */
export type RunDisposition = 'release' | 'abandon';

export interface RunProcessor {
  processRun(runId: string, signal: AbortSignal): Promise<RunDisposition>;
}

export interface DeadlineSweeper {
  sweepExpiredRuns(): Promise<number>;
}

export interface ConsumerOptions {
  concurrency: number;
  leaseMs: number;
  waitMs: number;
  sweepIntervalMs: number;
  /** Defaults to a third of the lease */
  heartbeatMs?: number;
  popBackoffInitialMs?: number;
  popBackoffMaxMs?: number;
}

export interface ConsumerStats {
  running: boolean;
  active: number;
  processed: number;
  abandoned: number;
}

/**
 * Pulls runs off the queue into a fixed number of worker slots and keeps each
 * claimed lease alive while its attempt runs.
 */
export class RunQueueConsumer {
  private readonly queue: RunQueue;
  private readonly processor: RunProcessor;
  private readonly logger: Logger;
  private readonly options: ConsumerOptions;
  private readonly sweeper?: DeadlineSweeper;
  private controller = new AbortController();
  private loops: Promise<void>[] = [];
  private stats: ConsumerStats = { running: false, active: 0, processed: 0, abandoned: 0 };

  constructor(
    queue: RunQueue,
    processor: RunProcessor,
    logger: Logger,
    options: ConsumerOptions,
    sweeper?: DeadlineSweeper
  ) {
    this.queue = queue;
    this.processor = processor;
    this.logger = logger.child({ component: 'run-queue-consumer' });
    this.options = options;
    this.sweeper = sweeper;
  }

  start(): void {
    if (this.stats.running) return;

    this.controller = new AbortController();
    this.stats.running = true;
    this.loops = Array.from({ length: this.options.concurrency }, (_, slot) => this.workerLoop(slot));
    if (this.sweeper) {
      this.loops.push(this.sweepLoop(this.sweeper));
    }
    this.logger.info('Run queue consumer started', { concurrency: this.options.concurrency });
  }

  /**
   * Stop claiming work. In-flight attempts are aborted and their leases
   * abandoned, so another worker picks them up after expiry.
   */
  async stop(): Promise<void> {
    if (!this.stats.running) return;

    this.controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.stats.running = false;
    this.logger.info('Run queue consumer stopped', { processed: this.stats.processed });
  }

  getStats(): ConsumerStats {
    return { ...this.stats };
  }

  /**
   * Claim and process a single run without waiting. Returns false when the queue was empty.
   */
  async runOnce(): Promise<boolean> {
    const handle = await this.queue.pop(this.options.leaseMs, { waitMs: 0 });
    if (!handle) return false;
    await this.process(handle, new AbortController().signal);
    return true;
  }

  /**
   * Process runs until the queue has nothing available
   */
  async drain(maxRuns: number = 1000): Promise<number> {
    let processed = 0;
    while (processed < maxRuns && await this.runOnce()) {
      processed++;
    }
    return processed;
  }

  private async workerLoop(slot: number): Promise<void> {
    const signal = this.controller.signal;
    let failures = 0;

    while (!signal.aborted) {
      let handle: RunHandle | null;
      try {
        handle = await this.queue.pop(this.options.leaseMs, { waitMs: this.options.waitMs, signal });
        failures = 0;
      } catch (error) {
        failures++;
        const delayMs = calculateBackoffDelay(
          failures - 1,
          this.options.popBackoffInitialMs ?? 500,
          this.options.popBackoffMaxMs ?? 30000
        );
        this.logger.error('Queue pop failed', { slot, failures, retry_in_ms: delayMs }, error);
        if (!(await this.pause(delayMs))) break;
        continue;
      }

      if (handle) {
        await this.process(handle, signal);
      }
    }
  }

  private async process(handle: RunHandle, stopSignal: AbortSignal): Promise<void> {
    const logger = this.logger.child({ run_id: handle.runId, delivery: handle.attempts });
    const attempt = new AbortController();
    const onStop = () => attempt.abort(stopSignal.reason);
    stopSignal.addEventListener('abort', onStop, { once: true });

    const heartbeatMs = this.options.heartbeatMs ?? Math.max(1, Math.floor(this.options.leaseMs / 3));
    const heartbeat = setInterval(() => {
      handle.renew().catch((error: unknown) => {
        logger.warn('Lease renewal failed; abandoning attempt', {
          reason: error instanceof Error ? error.message : String(error),
        });
        attempt.abort(error);
      });
    }, heartbeatMs);

    this.stats.active++;
    try {
      const disposition = await this.processor.processRun(handle.runId, attempt.signal);
      if (disposition === 'release' && !attempt.signal.aborted) {
        const released = await handle.release();
        if (!released) {
          logger.warn('Lease was lost before release');
        }
        this.stats.processed++;
      } else {
        await handle.abandon();
        this.stats.abandoned++;
      }
    } catch (error) {
      logger.error('Run attempt failed unexpectedly; abandoning lease', {}, error);
      await handle.abandon();
      this.stats.abandoned++;
    } finally {
      clearInterval(heartbeat);
      stopSignal.removeEventListener('abort', onStop);
      this.stats.active--;
    }
  }

  private async sweepLoop(sweeper: DeadlineSweeper): Promise<void> {
    while (await this.pause(this.options.sweepIntervalMs)) {
      try {
        const expired = await sweeper.sweepExpiredRuns();
        if (expired > 0) {
          this.logger.info('Expired overdue runs', { count: expired });
        }
      } catch (error) {
        this.logger.error('Deadline sweep failed', {}, error);
      }
    }
  }

  /**
   * Wait unless stopped; false once the consumer is stopping
   */
  private async pause(ms: number): Promise<boolean> {
    try {
      await sleep(ms, this.controller.signal);
      return true;
    } catch (error) {
      if (this.controller.signal.aborted) {
        return false;
      }
      throw error;
    }
  }
}
