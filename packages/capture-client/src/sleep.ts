import type { Sleep } from "./types.js";

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener("abort", finish, { once: true });
  });

/** Resolves once `promise` settles or `signal` aborts, whichever comes first. */
export const settledOrAborted = (promise: Promise<unknown>, signal?: AbortSignal): Promise<void> => {
  const settled = promise.then(
    () => undefined,
    () => undefined,
  );
  if (!signal) {
    return settled;
  }
  if (signal.aborted) {
    return Promise.resolve();
  }
  const aborted = new Promise<void>((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
  return Promise.race([settled, aborted]);
};
