import { abortReason } from './deadline.js';

interface Waiter {
  readonly grant: () => void;
  readonly signal?: AbortSignal;
  readonly onAbort?: () => void;
}

/**
 * Counting admission gate shared by every outbound model request in the process.
 *
 * A caller that cannot get a slot waits in FIFO order; it never fails for lack of a slot,
 * only when its own signal aborts (typically the owning invocation's deadline).
 */
export class AdmissionGate {
  private active = 0;
  private readonly queue: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`AdmissionGate capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Number of slots currently held */
  get inFlight(): number {
    return this.active;
  }

  /** Number of callers waiting for a slot */
  get waiting(): number {
    return this.queue.length;
  }

  /**
   * Acquire a slot. Resolves with a release function that must be called exactly once.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve(this.releaser());
    }

    return new Promise<() => void>((resolve, reject) => {
      const onAbort = signal
        ? () => {
            const idx = this.queue.indexOf(waiter);
            if (idx >= 0) this.queue.splice(idx, 1);
            reject(abortReason(signal));
          }
        : undefined;

      const waiter: Waiter = {
        grant: () => resolve(this.releaser()),
        signal,
        onAbort,
      };

      if (signal && onAbort) signal.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  /** Run `task` while holding a slot */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.queue.shift();
    if (!next) {
      this.active--;
      return;
    }
    // Slot passes directly to the next waiter; `active` stays the same
    if (next.signal && next.onAbort) next.signal.removeEventListener('abort', next.onAbort);
    next.grant();
  }
}
