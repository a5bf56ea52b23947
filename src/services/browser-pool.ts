import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/error-handlers.js';
import type { PoolableSession, BrowserPoolStats } from '../types/session.js';

const log = logger.createContext('browser-pool');

export const DEFAULT_POOL_CAPACITY = 3;

export type SessionFactory<S extends PoolableSession> = () => Promise<S>;

interface Waiter<S> {
  resolve: (session: S) => void;
  reject: (error: Error) => void;
}

/**
 * Bounded set of reusable browser sessions.
 *
 * Sessions are created lazily up to `capacity`. Once the pool is full,
 * `acquire()` waits (FIFO) until another caller releases or discards a
 * session. A checked-out session belongs to exactly one caller.
 *
 * The pool's capacity is also the render lane's width: no more than
 * `capacity` browser renders run at once, whatever the fetch concurrency.
 */
export class BrowserPool<S extends PoolableSession> {
  private idle: S[] = [];
  private checkedOut = new Set<S>();
  private waiters: Waiter<S>[] = [];
  private pendingCreates = 0;
  private created = 0;
  private destroyed = 0;
  private draining = false;

  constructor(
    private readonly factory: SessionFactory<S>,
    readonly capacity: number = DEFAULT_POOL_CAPACITY
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Browser pool capacity must be a positive integer, got ${capacity}`);
    }
    log.debug(`Initialized with capacity ${capacity}`);
  }

  /**
   * Live sessions owned by the pool, idle or checked out (plus ones being created).
   */
  get size(): number {
    return this.idle.length + this.checkedOut.size + this.pendingCreates;
  }

  /**
   * Check out a session: reuse an idle one, create one if below capacity,
   * otherwise wait for one to come back.
   */
  async acquire(): Promise<S> {
    const reusable = this.idle.pop();
    if (reusable) {
      this.checkedOut.add(reusable);
      log.debug(`Reused ${reusable.id} (${this.describe()})`);
      return reusable;
    }

    if (this.size < this.capacity) {
      return this.createAndCheckOut();
    }

    log.debug(`Pool exhausted, waiting (${this.describe()})`);
    return new Promise<S>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Return a healthy session after use. Faulted sessions go to `discard()`.
   */
  async release(session: S): Promise<void> {
    if (!this.checkedOut.delete(session)) {
      log.warn(`Ignoring release of ${session.id}: not checked out from this pool`);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this.checkedOut.add(session);
      log.debug(`Handed ${session.id} to a waiting caller`);
      waiter.resolve(session);
      return;
    }

    if (this.draining || this.size >= this.capacity) {
      await this.destroy(session);
      return;
    }

    this.idle.push(session);
  }

  /**
   * Tear down a session that faulted while checked out and free its slot.
   */
  async discard(session: S): Promise<void> {
    this.checkedOut.delete(session);
    await this.destroy(session);
    this.serveWaiter();
  }

  /**
   * Tear down every idle session. Sessions still checked out are left to
   * their callers.
   */
  async drain(): Promise<void> {
    this.draining = true;
    const sessions = this.idle;
    this.idle = [];
    log.debug(`Draining ${sessions.length} idle session(s)`);
    await Promise.all(sessions.map(session => this.destroy(session)));
    this.draining = false;
  }

  stats(): BrowserPoolStats {
    return {
      capacity: this.capacity,
      size: this.size,
      idle: this.idle.length,
      inUse: this.checkedOut.size,
      waiting: this.waiters.length,
      created: this.created,
      destroyed: this.destroyed
    };
  }

  private async createAndCheckOut(): Promise<S> {
    this.pendingCreates++;
    let session: S;
    try {
      session = await this.factory();
    } catch (error) {
      this.pendingCreates--;
      log.error(`Failed to create session: ${errorMessage(error)}`);
      this.serveWaiter();
      throw error;
    }
    this.pendingCreates--;

    this.created++;
    this.checkedOut.add(session);
    log.verbose(`Created ${session.id} (${this.describe()})`);
    return session;
  }

  /**
   * A slot freed up: create a session for the longest-waiting caller.
   */
  private serveWaiter(): void {
    const waiter = this.waiters[0];
    if (!waiter) return;

    const reusable = this.idle.pop();
    if (reusable) {
      this.waiters.shift();
      this.checkedOut.add(reusable);
      waiter.resolve(reusable);
      return;
    }

    if (this.size >= this.capacity) return;

    this.waiters.shift();
    this.createAndCheckOut().then(waiter.resolve, (error: unknown) => {
      waiter.reject(error instanceof Error ? error : new Error(errorMessage(error)));
    });
  }

  private async destroy(session: S): Promise<void> {
    this.destroyed++;
    try {
      await session.cleanup();
      log.debug(`Destroyed ${session.id}`);
    } catch (error) {
      log.error(`Failed to destroy ${session.id}: ${errorMessage(error)}`);
    }
  }

  private describe(): string {
    return `${this.checkedOut.size} in use, ${this.idle.length} idle, capacity ${this.capacity}`;
  }
}
