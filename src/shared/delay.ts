export type SleepOutcome = "elapsed" | "aborted";

/**
 * @example
 * if ((await sleep(2000, signal)) === "aborted") return Err(new CancelledError(url));
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<SleepOutcome> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve("aborted");
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve("aborted");
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve("elapsed");
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
