// frontend/museum/src/utils/timing.ts

export type Cancellable<A extends unknown[]> = ((...args: A) => void) & {
  cancel(): void;
};

/** Trailing edge: runs once, `waitMs` after the last call, with its arguments. */
export function debounce<A extends unknown[]>(
  fn: (...args: A) => void,
  waitMs: number
): Cancellable<A> {
  let timer: ReturnType<typeof setTimeout> | null = null;

  const debounced = (...args: A) => {
    if (timer !== null) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      fn(...args);
    }, waitMs);
  };

  return Object.assign(debounced, {
    cancel() {
      if (timer !== null) clearTimeout(timer);
      timer = null;
    },
  });
}

/**
 * Leading call right away, then at most one trailing call per interval
 * carrying the latest arguments.
 */
export function throttle<A extends unknown[]>(
  fn: (...args: A) => void,
  intervalMs: number
): Cancellable<A> {
  let timer: ReturnType<typeof setTimeout> | null = null;
  let pending: A | null = null;

  const tick = () => {
    if (pending) {
      const args = pending;
      pending = null;
      fn(...args);
      timer = setTimeout(tick, intervalMs);
    } else {
      timer = null;
    }
  };

  const throttled = (...args: A) => {
    if (timer === null) {
      fn(...args);
      timer = setTimeout(tick, intervalMs);
    } else {
      pending = args;
    }
  };

  return Object.assign(throttled, {
    cancel() {
      if (timer !== null) clearTimeout(timer);
      timer = null;
      pending = null;
    },
  });
}
