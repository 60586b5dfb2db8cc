/**
 * Settles like {@link work} unless {@link signal} aborts first, in which case it
 * rejects with the abort reason. `fetch` honours its signal only while the
 * request is in flight; body reads and stand-in transports may not, so the
 * timers guarding engine calls race the whole exchange instead.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  const aborted = new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
  return Promise.race([work, aborted]);
}
