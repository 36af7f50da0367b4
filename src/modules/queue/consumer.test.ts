import type { Kysely } from 'kysely';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LeaseLostError } from '../errors';
import { createLogger } from '../monitoring';
import { createDatabase, migrate, type Database } from '../storage';
import { ManualClock } from '../../test/harness';
import { RunQueueConsumer, type ConsumerOptions, type RunDisposition, type RunProcessor } from './consumer';
import { SqlRunQueue, type RunQueue } from './run-queue';

const logger = createLogger({ LOG_LEVEL: 'error', NODE_ENV: 'test' }, () => {});

const options: ConsumerOptions = {
  concurrency: 2,
  leaseMs: 30_000,
  waitMs: 10,
  sweepIntervalMs: 60_000,
};

class RecordingProcessor implements RunProcessor {
  readonly seen: string[] = [];

  constructor(private readonly outcome: (runId: string) => Promise<RunDisposition>) {}

  async processRun(runId: string): Promise<RunDisposition> {
    this.seen.push(runId);
    return this.outcome(runId);
  }
}

describe('RunQueueConsumer', () => {
  let db: Kysely<Database>;
  let clock: ManualClock;
  let queue: SqlRunQueue;

  beforeEach(async () => {
    db = createDatabase(':memory:');
    await migrate(db);
    clock = new ManualClock();
    queue = new SqlRunQueue(db, { clock, pollIntervalMs: 1 });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('drains released runs from the queue', async () => {
    const processor = new RecordingProcessor(async () => 'release');
    const consumer = new RunQueueConsumer(queue, processor, logger, options);
    await queue.push('run_a');
    clock.advance(1);
    await queue.push('run_b');

    expect(await consumer.drain()).toBe(2);
    expect(processor.seen).toEqual(['run_a', 'run_b']);
    expect(await queue.depth()).toBe(0);
    expect(consumer.getStats()).toEqual({ running: false, active: 0, processed: 2, abandoned: 0 });
  });

  it('keeps abandoned and crashed runs for redelivery', async () => {
    const processor = new RecordingProcessor(async runId => {
      if (runId === 'run_a') return 'abandon';
      throw new Error('processor bug');
    });
    const consumer = new RunQueueConsumer(queue, processor, logger, options);
    await queue.push('run_a');
    clock.advance(1);
    await queue.push('run_b');

    expect(await consumer.drain()).toBe(2);
    expect(consumer.getStats().abandoned).toBe(2);
    expect(await queue.depth()).toBe(2);

    clock.advance(options.leaseMs);
    expect((await queue.pop(options.leaseMs))?.attempts).toBe(2);
  });

  it('processes pushed runs in the background until stopped', async () => {
    const processor = new RecordingProcessor(async () => 'release');
    const sweeper = { sweepExpiredRuns: vi.fn(async () => 0) };
    const consumer = new RunQueueConsumer(queue, processor, logger, options, sweeper);

    consumer.start();
    expect(consumer.getStats().running).toBe(true);
    await queue.push('run_a');

    await vi.waitFor(() => {
      expect(consumer.getStats().processed).toBe(1);
    });
    await consumer.stop();

    expect(processor.seen).toEqual(['run_a']);
    expect(consumer.getStats()).toEqual({ running: false, active: 0, processed: 1, abandoned: 0 });
    expect(sweeper.sweepExpiredRuns).not.toHaveBeenCalled();
  });

  it('aborts and abandons the attempt when the lease cannot be renewed', async () => {
    let reason: unknown;
    const processor: RunProcessor = {
      async processRun(runId, signal) {
        // Another party takes the item away, so renewal finds no lease
        await db.deleteFrom('run_queue').where('run_id', '=', runId).execute();
        await new Promise<void>(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
        reason = signal.reason;
        return 'release';
      },
    };
    const consumer = new RunQueueConsumer(queue, processor, logger, { ...options, heartbeatMs: 5 });
    await queue.push('run_a');

    expect(await consumer.drain()).toBe(1);

    expect(reason).toBeInstanceOf(LeaseLostError);
    expect(consumer.getStats()).toEqual({ running: false, active: 0, processed: 0, abandoned: 1 });
  });

  it('backs off and keeps polling after a failed pop', async () => {
    const lines: Array<Record<string, unknown>> = [];
    const capturing = createLogger({ LOG_LEVEL: 'error', NODE_ENV: 'test' }, (_level, line) => {
      lines.push(JSON.parse(line));
    });
    let failures = 0;
    const flaky: RunQueue = {
      push: (runId, within) => queue.push(runId, within),
      depth: () => queue.depth(),
      pop: async (leaseMs, popOptions) => {
        if (failures < 2) {
          failures++;
          throw new Error('database is locked');
        }
        return queue.pop(leaseMs, popOptions);
      },
    };
    const processor = new RecordingProcessor(async () => 'release');
    const consumer = new RunQueueConsumer(flaky, processor, capturing, {
      ...options,
      concurrency: 1,
      popBackoffInitialMs: 1,
      popBackoffMaxMs: 2,
    });
    await queue.push('run_a');

    consumer.start();
    await vi.waitFor(() => {
      expect(consumer.getStats().processed).toBe(1);
    });
    await consumer.stop();

    expect(processor.seen).toEqual(['run_a']);
    expect(lines.filter(line => line.message === 'Queue pop failed').map(line => line.retry_in_ms)).toEqual([1, 2]);
  });
});
