// Serializes calls made through one shared client transport.
//
// The lock is taken in beginCall and released when readResponse settles, or
// as soon as any step in between fails.

import type { WireType } from "@wirecall/postcard";
import type { MethodId } from "./method.ts";
import type { ClientTransport, AsyncClientTransport } from "./transport.ts";
import { RpcError } from "./error.ts";

// ============================================================================
// AsyncMutex
// ============================================================================

/** FIFO mutex. Waiting for it is a suspension point. */
export class AsyncMutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Hand the lock to the next waiter, or free it. */
  unlock(): void {
    if (!this.locked) {
      throw new Error("AsyncMutex: unlock of an unlocked mutex");
    }
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get queueLength(): number {
    return this.waiters.length;
  }
}

/** Releases its lock at most once. */
export class Hold {
  private released = false;

  constructor(private readonly unlock: () => void) {}

  release(): void {
    if (this.released) return;
    this.released = true;
    this.unlock();
  }
}

export interface Locked<S> {
  readonly inner: S;
  readonly hold: Hold;
}

// ============================================================================
// Async wrapper
// ============================================================================

export class LockedAsyncClientTransport<TX, F> implements AsyncClientTransport<Locked<TX>, Locked<F>> {
  private readonly mutex = new AsyncMutex();

  constructor(private readonly inner: AsyncClientTransport<TX, F>) {}

  async beginCall(id: MethodId): Promise<Locked<TX>> {
    await this.mutex.lock();
    const hold = new Hold(() => this.mutex.unlock());
    return { inner: await releaseOnError(hold, () => this.inner.beginCall(id)), hold };
  }

  async addParam<T>(name: string, value: T, type: WireType<T>, state: Locked<TX>): Promise<void> {
    await releaseOnError(state.hold, () => this.inner.addParam(name, value, type, state.inner));
  }

  async finalize(state: Locked<TX>): Promise<Locked<F>> {
    return { inner: await releaseOnError(state.hold, () => this.inner.finalize(state.inner)), hold: state.hold };
  }

  async readResponse<T>(state: Locked<F>, type: WireType<T>): Promise<T> {
    try {
      return await this.inner.readResponse(state.inner, type);
    } finally {
      state.hold.release();
    }
  }
}

async function releaseOnError<T>(hold: Hold, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    hold.release();
    throw e;
  }
}

// ============================================================================
// Blocking wrapper
// ============================================================================

/**
 * Blocking counterpart. Synchronous calls cannot overlap, so the only way a
 * second call reaches beginCall while one is held is re-entrance from the
 * same stack; that is refused rather than waited for.
 */
export class LockedClientTransport<TX, F> implements ClientTransport<Locked<TX>, Locked<F>> {
  private held = false;

  constructor(private readonly inner: ClientTransport<TX, F>) {}

  beginCall(id: MethodId): Locked<TX> {
    if (this.held) {
      throw RpcError.illegalState("transport lock is already held by an unfinished call");
    }
    this.held = true;
    const hold = new Hold(() => {
      this.held = false;
    });
    return { inner: releaseOnErrorSync(hold, () => this.inner.beginCall(id)), hold };
  }

  addParam<T>(name: string, value: T, type: WireType<T>, state: Locked<TX>): void {
    releaseOnErrorSync(state.hold, () => this.inner.addParam(name, value, type, state.inner));
  }

  finalize(state: Locked<TX>): Locked<F> {
    return { inner: releaseOnErrorSync(state.hold, () => this.inner.finalize(state.inner)), hold: state.hold };
  }

  readResponse<T>(state: Locked<F>, type: WireType<T>): T {
    try {
      return this.inner.readResponse(state.inner, type);
    } finally {
      state.hold.release();
    }
  }
}

function releaseOnErrorSync<T>(hold: Hold, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    hold.release();
    throw e;
  }
}
