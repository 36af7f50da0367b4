import { randomUUID } from 'node:crypto';
import type { Kysely } from 'kysely';
import { LeaseLostError } from '../errors';
import { sleep } from '../retry';
import type { Database, EntityStore } from '../storage';
import type { Clock } from '../services/types';
import { systemClock } from '../services/utils';

/**
 * Exclusive, time-limited claim on one queued run
 */
export interface RunHandle {
  readonly runId: string;
  /** Deliveries of this queue item so far, including this one */
  readonly attempts: number;
  /** Extend the lease; throws LeaseLostError when another worker owns the item */
  renew(): Promise<void>;
  /** Finished with the item. Returns false when the lease had already been lost. */
  release(): Promise<boolean>;
  /** Stop holding the item; it is redelivered once the lease expires */
  abandon(): Promise<void>;
}

export interface PopOptions {
  waitMs?: number;
  signal?: AbortSignal;
}

/**
 * At-least-once queue of run ids
 */
export interface RunQueue {
  /**
   * Make the run available for processing. Passing a store that is inside a
   * transaction makes the push part of it.
   */
  push(runId: string, within?: EntityStore): Promise<void>;
  /** Claim the oldest available run, waiting up to waitMs; null when none arrived */
  pop(leaseMs: number, options?: PopOptions): Promise<RunHandle | null>;
  depth(): Promise<number>;
}

export interface SqlRunQueueOptions {
  clock?: Clock;
  pollIntervalMs?: number;
}

/**
 * Run queue kept in the run_queue table of the entity database. A lease is a
 * random token plus an expiry; claims and renewals compare the token.
 */
export class SqlRunQueue implements RunQueue {
  private readonly db: Kysely<Database>;
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;

  constructor(db: Kysely<Database>, options: SqlRunQueueOptions = {}) {
    this.db = db;
    this.clock = options.clock ?? systemClock;
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
  }

  async push(runId: string, within?: EntityStore): Promise<void> {
    const db = within?.db ?? this.db;
    const now = this.clock.now();

    // Pushing a leased item flags it so release() makes it available again
    await db.insertInto('run_queue')
      .values({
        run_id: runId,
        enqueued_at: now,
        available_at: now,
        lease_token: null,
        lease_expires_at: null,
        attempts: 0,
        pending_push: 0,
      })
      .onConflict(oc => oc.column('run_id').doUpdateSet({ pending_push: 1, available_at: now }))
      .execute();
  }

  async pop(leaseMs: number, options: PopOptions = {}): Promise<RunHandle | null> {
    const waitMs = options.waitMs ?? 0;
    const startedAt = Date.now();

    for (;;) {
      const handle = await this.tryClaim(leaseMs);
      if (handle) {
        return handle;
      }
      if (options.signal?.aborted || Date.now() - startedAt >= waitMs) {
        return null;
      }

      try {
        await sleep(Math.min(this.pollIntervalMs, waitMs), options.signal);
      } catch (error) {
        if (options.signal?.aborted) {
          return null;
        }
        throw error;
      }
    }
  }

  async depth(): Promise<number> {
    const row = await this.db.selectFrom('run_queue')
      .select(eb => eb.fn.countAll<number>().as('count'))
      .executeTakeFirst();
    return Number(row?.count ?? 0);
  }

  private async tryClaim(leaseMs: number): Promise<RunHandle | null> {
    return this.db.transaction().execute(async trx => {
      const now = this.clock.now();
      const candidate = await trx.selectFrom('run_queue')
        .selectAll()
        .where('available_at', '<=', now)
        .where(eb => eb.or([
          eb('lease_expires_at', 'is', null),
          eb('lease_expires_at', '<=', now),
        ]))
        .orderBy('enqueued_at', 'asc')
        .orderBy('run_id', 'asc')
        .limit(1)
        .executeTakeFirst();

      if (!candidate) {
        return null;
      }

      const token = randomUUID();
      const attempts = candidate.attempts + 1;
      const previousToken = candidate.lease_token;
      const result = await trx.updateTable('run_queue')
        .set({ lease_token: token, lease_expires_at: now + leaseMs, attempts, pending_push: 0 })
        .where('run_id', '=', candidate.run_id)
        .where(eb => previousToken === null
          ? eb('lease_token', 'is', null)
          : eb('lease_token', '=', previousToken))
        .executeTakeFirst();

      if (Number(result.numUpdatedRows) === 0) {
        return null;
      }
      return new SqlRunHandle(this, candidate.run_id, token, attempts, leaseMs);
    });
  }

  async renewLease(runId: string, token: string, leaseMs: number): Promise<void> {
    const result = await this.db.updateTable('run_queue')
      .set({ lease_expires_at: this.clock.now() + leaseMs })
      .where('run_id', '=', runId)
      .where('lease_token', '=', token)
      .executeTakeFirst();

    if (Number(result.numUpdatedRows) === 0) {
      throw new LeaseLostError(runId);
    }
  }

  async releaseLease(runId: string, token: string): Promise<boolean> {
    return this.db.transaction().execute(async trx => {
      const deleted = await trx.deleteFrom('run_queue')
        .where('run_id', '=', runId)
        .where('lease_token', '=', token)
        .where('pending_push', '=', 0)
        .executeTakeFirst();
      if (Number(deleted.numDeletedRows) > 0) {
        return true;
      }

      const requeued = await trx.updateTable('run_queue')
        .set({ lease_token: null, lease_expires_at: null, pending_push: 0, available_at: this.clock.now() })
        .where('run_id', '=', runId)
        .where('lease_token', '=', token)
        .executeTakeFirst();
      return Number(requeued.numUpdatedRows) > 0;
    });
  }
}

class SqlRunHandle implements RunHandle {
  private closed = false;

  constructor(
    private readonly queue: SqlRunQueue,
    readonly runId: string,
    private readonly token: string,
    readonly attempts: number,
    private readonly leaseMs: number
  ) {}

  async renew(): Promise<void> {
    if (this.closed) {
      throw new LeaseLostError(this.runId);
    }
    await this.queue.renewLease(this.runId, this.token, this.leaseMs);
  }

  async release(): Promise<boolean> {
    if (this.closed) return false;
    this.closed = true;
    return this.queue.releaseLease(this.runId, this.token);
  }

  async abandon(): Promise<void> {
    this.closed = true;
  }
}
