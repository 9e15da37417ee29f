// lib/util/withTimeout.ts

/**
 * Rejects with `onTimeout()` when `p` has not settled within `ms`. A null `ms`
 * returns `p` unchanged. The timer is always cleared, so nothing is left pending.
 */
export function withTimeout<T>(p: Promise<T>, ms: number | null, onTimeout: () => Error): Promise<T> {
  if (ms === null) return p;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}
