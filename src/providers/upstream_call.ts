import { UpstreamResponseError, UpstreamUnavailableError, errorMessage, type UpstreamSource } from "../errors";

export type RetryPolicy = {
  maxAttempts: number;
  // Doubled after each failed attempt.
  backoffMs: number;
};

export const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 3, backoffMs: 200 };

function backoff(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("backoff aborted"));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs one outbound call under a timeout. The callee receives a child
 * AbortSignal that fires on timeout or when the parent signal aborts.
 * Failures marked retryable are attempted again with exponential backoff,
 * all inside the same timeout. Every failure surfaces as
 * UpstreamUnavailableError.
 */
export async function callUpstream<T>(args: {
  source: UpstreamSource;
  timeoutMs: number;
  signal?: AbortSignal;
  retry?: RetryPolicy;
  run: (signal: AbortSignal) => Promise<T>;
}): Promise<T> {
  const { source, timeoutMs } = args;
  const retry = args.retry ?? DEFAULT_RETRY;
  if (args.signal?.aborted) {
    throw new UpstreamUnavailableError(source, "aborted", `${source} call aborted before start`);
  }

  const controller = new AbortController();
  let timedOut = false;
  let attempts = 0;
  let statusCode: number | undefined;
  let timer: NodeJS.Timeout | undefined;
  const onParentAbort = () => controller.abort();
  args.signal?.addEventListener("abort", onParentAbort, { once: true });

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(
        new UpstreamUnavailableError(source, "timeout", `${source} call exceeded ${timeoutMs}ms`, {
          statusCode,
          attempts,
        })
      );
    }, timeoutMs);
  });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => {
        if (!timedOut) {
          reject(new UpstreamUnavailableError(source, "aborted", `${source} call aborted`, { attempts }));
        }
      },
      { once: true }
    );
  });

  const attempt = async (): Promise<T> => {
    for (;;) {
      attempts += 1;
      try {
        return await args.run(controller.signal);
      } catch (error) {
        if (!(error instanceof UpstreamResponseError)) throw error;
        statusCode = error.statusCode;
        if (!error.retryable || attempts >= retry.maxAttempts || controller.signal.aborted) throw error;
      }
      await backoff(retry.backoffMs * 2 ** (attempts - 1), controller.signal);
    }
  };

  try {
    return await Promise.race([attempt(), timeout, aborted]);
  } catch (error) {
    if (error instanceof UpstreamUnavailableError) throw error;
    throw new UpstreamUnavailableError(source, timedOut ? "timeout" : "error", errorMessage(error), {
      statusCode,
      attempts,
    });
  } finally {
    clearTimeout(timer);
    args.signal?.removeEventListener("abort", onParentAbort);
  }
}
