import { ReviewError } from '../errors.js';

/**
 * Wall-clock deadline backed by an AbortController.
 * The signal aborts with a `timed_out` ReviewError once `timeoutMs` has elapsed.
 * Call `dispose()` when the guarded work finishes so the timer does not linger.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly startedAt = Date.now();

  constructor(
    readonly timeoutMs: number,
    label: string,
  ) {
    this.timer = setTimeout(() => {
      this.controller.abort(
        new ReviewError('timed_out', `${label} timed out after ${formatSeconds(timeoutMs)}`),
      );
    }, timeoutMs);
    this.timer.unref();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(this.timeoutMs - this.elapsedMs, 0);
  }

  dispose(): void {
    clearTimeout(this.timer);
  }
}

/**
 * Race a promise against an abort signal.
 * The underlying work is NOT cancelled; only this caller stops waiting for it.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** Sentinel returned by `withTimeout` when the timer wins */
export const TIMED_OUT = Symbol('timed-out');

/**
 * Resolve with the promise's value, or with `TIMED_OUT` after `timeoutMs`.
 * Rejections of the promise propagate; so does an abort of `signal`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });
  try {
    return await raceAbort(Promise.race([promise, timeout]), signal);
  } finally {
    clearTimeout(timer);
  }
}

/** The abort reason as an Error, defaulting to a generic `timed_out` ReviewError */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new ReviewError('timed_out', 'Operation was cancelled');
}

export function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}
