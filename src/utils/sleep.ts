/**
 * Resolves `true` once `ms` elapses, or `false` as soon as `signal` aborts.
 * An unref'd sleep does not keep the process alive on its own.
 */
export const sleep = (
  ms: number,
  opts: { unref?: boolean; signal?: AbortSignal } = {},
): Promise<boolean> =>
  new Promise((resolve) => {
    const { signal } = opts;
    if (signal?.aborted) return resolve(false);
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, Math.max(0, ms));
    if (opts.unref) timer.unref();
    signal?.addEventListener("abort", onAbort, { once: true });
  });
