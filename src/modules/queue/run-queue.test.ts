import type { Kysely } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LeaseLostError } from '../errors';
import { EntityStore, createDatabase, migrate, type Database } from '../storage';
import { ManualClock } from '../../test/harness';
import { SqlRunQueue } from './run-queue';

const LEASE_MS = 30_000;

describe('SqlRunQueue', () => {
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

  it('hands a run to one consumer at a time', async () => {
    await queue.push('run_a');

    const first = await queue.pop(LEASE_MS);
    expect(first?.runId).toBe('run_a');
    expect(first?.attempts).toBe(1);
    expect(await queue.pop(LEASE_MS)).toBeNull();

    expect(await first?.release()).toBe(true);
    expect(await queue.depth()).toBe(0);
  });

  it('delivers runs oldest first', async () => {
    await queue.push('run_a');
    clock.advance(1);
    await queue.push('run_b');

    expect((await queue.pop(LEASE_MS))?.runId).toBe('run_a');
    expect((await queue.pop(LEASE_MS))?.runId).toBe('run_b');
  });

  it('redelivers a run whose lease expired', async () => {
    await queue.push('run_a');
    const stale = await queue.pop(LEASE_MS);

    clock.advance(LEASE_MS);
    const fresh = await queue.pop(LEASE_MS);
    expect(fresh?.runId).toBe('run_a');
    expect(fresh?.attempts).toBe(2);

    await expect(stale?.renew()).rejects.toBeInstanceOf(LeaseLostError);
    expect(await stale?.release()).toBe(false);
    expect(await queue.depth()).toBe(1);

    expect(await fresh?.release()).toBe(true);
    expect(await queue.depth()).toBe(0);
  });

  it('keeps a lease alive while it is renewed', async () => {
    await queue.push('run_a');
    const handle = await queue.pop(LEASE_MS);

    clock.advance(LEASE_MS - 1);
    await handle?.renew();
    clock.advance(LEASE_MS - 1);

    expect(await queue.pop(LEASE_MS)).toBeNull();
  });

  it('makes a run available again when it was pushed while leased', async () => {
    await queue.push('run_a');
    const handle = await queue.pop(LEASE_MS);

    await queue.push('run_a');
    expect(await queue.pop(LEASE_MS)).toBeNull();

    expect(await handle?.release()).toBe(true);
    const again = await queue.pop(LEASE_MS);
    expect(again?.runId).toBe('run_a');
    expect(again?.attempts).toBe(2);
  });

  it('leaves an abandoned run for redelivery after its lease', async () => {
    await queue.push('run_a');
    const handle = await queue.pop(LEASE_MS);
    await handle?.abandon();

    expect(await queue.pop(LEASE_MS)).toBeNull();
    clock.advance(LEASE_MS);
    expect((await queue.pop(LEASE_MS))?.runId).toBe('run_a');
  });

  it('only enqueues when the surrounding transaction commits', async () => {
    const store = new EntityStore(db);

    await expect(store.transaction(async trx => {
      await queue.push('run_a', trx);
      throw new Error('rolled back');
    })).rejects.toThrow('rolled back');
    expect(await queue.depth()).toBe(0);

    await store.transaction(trx => queue.push('run_b', trx));
    expect(await queue.depth()).toBe(1);
  });

  it('waits for a push up to waitMs', async () => {
    expect(await queue.pop(LEASE_MS, { waitMs: 5 })).toBeNull();

    const waiting = queue.pop(LEASE_MS, { waitMs: 1000 });
    await queue.push('run_a');
    expect((await waiting)?.runId).toBe('run_a');
  });
});
