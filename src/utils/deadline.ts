// ── Settled results ──────────────────────────────────────────

export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/** Turn a promise into one that never rejects. */
export function settle<T>(work: Promise<T>): Promise<Settled<T>> {
  return work.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error }),
  );
}

// ── Time budget ──────────────────────────────────────────────

/** `signal` combined with a fresh timeout of `ms`, or the timeout alone. */
export function deadlineSignal(signal: AbortSignal | undefined, ms: number): AbortSignal {
  const timeout = AbortSignal.timeout(ms);
  return signal === undefined ? timeout : AbortSignal.any([signal, timeout]);
}

export const TIMED_OUT = Symbol('timed-out');

/**
 * Race `work` against a timer. The timer is cleared as soon as the work
 * settles; the work itself keeps running when the timer wins, so callers
 * should hand in a settled promise and cancel it through their own signal.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
