import type { RetryPolicy } from "@/application/options";
import type { HttpClient, HttpRequestParams, HttpResponse } from "@/application/ports/http-client";
import type { Logger } from "@/application/ports/logger";
import { CancelledError, Err, HttpError, Ok, TimeoutError, type Result, type TransportError } from "@/domain/error";
import { sleep } from "@/shared/delay";

export type PollRequest = {
  readonly url: string;
  readonly params: HttpRequestParams;
  /**
   * Asynchronous endpoints answer 202 (or a placeholder body) until the data is ready
   * and are re-issued; synchronous endpoints are requested exactly once.
   */
  readonly asynchronous: boolean;
  /** Recognises a 2xx placeholder body on asynchronous endpoints. */
  readonly isPending?: (body: Uint8Array) => boolean;
};

export type PollContext = {
  readonly httpClient: HttpClient;
  readonly logger: Logger;
  readonly retry: RetryPolicy;
  readonly headers?: Readonly<Record<string, string>>;
  readonly timeoutMs?: number;
  readonly now?: () => number;
};

export type AttemptOutcome =
  | { readonly state: "success"; readonly body: Uint8Array }
  | { readonly state: "retryable"; readonly retryAfterMs: number | null }
  | { readonly state: "failed"; readonly error: HttpError };

export type PollError = TransportError | HttpError | TimeoutError | CancelledError;

const HTTP_ACCEPTED = 202;

const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

/**
 * `Retry-After` is either delta-seconds or an HTTP date.
 * @link https://www.rfc-editor.org/rfc/rfc9110#field.retry-after
 */
export const parseRetryAfter = (value: string | undefined, now: number): number | null => {
  if (value === undefined) return null;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
};

export const computeRetryDelay = (policy: RetryPolicy, attempt: number, retryAfterMs: number | null): number => {
  if (retryAfterMs !== null) {
    return Math.min(retryAfterMs, policy.maxDelayMs);
  }
  const backoff = policy.initialDelayMs * policy.backoffFactor ** (attempt - 1);
  return Math.round(Math.min(backoff, policy.maxDelayMs));
};

/** A 202 is only retried on asynchronous endpoints; elsewhere it fails as an `HttpError`. */
export const classifyResponse = (
  request: PollRequest,
  response: HttpResponse<Uint8Array>,
  now: number
): AttemptOutcome => {
  const { status } = response;

  if (request.asynchronous && status === HTTP_ACCEPTED) {
    return { state: "retryable", retryAfterMs: parseRetryAfter(response.headers["retry-after"], now) };
  }
  if (isSuccessStatus(status) && status !== HTTP_ACCEPTED) {
    if (request.asynchronous && request.isPending?.(response.data) === true) {
      return { state: "retryable", retryAfterMs: parseRetryAfter(response.headers["retry-after"], now) };
    }
    return { state: "success", body: response.data };
  }

  const message = status === HTTP_ACCEPTED ? "accepted without content" : "unexpected status";
  return { state: "failed", error: new HttpError({ message, url: request.url, status }) };
};

/**
 * Issues the request and, for asynchronous endpoints, keeps re-issuing it with capped
 * exponential back-off until the body is ready or `retry.maxAttempts` requests were sent.
 */
export async function executePollRequest(
  request: PollRequest,
  context: PollContext,
  signal?: AbortSignal
): Promise<Result<Uint8Array, PollError>> {
  const { httpClient, logger, retry } = context;
  const now = context.now ?? Date.now;
  const maxAttempts = request.asynchronous ? retry.maxAttempts : 1;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return Err(new CancelledError(request.url));
    }

    logger.debug(`GET ${request.url} (attempt ${attempt}/${maxAttempts})`);
    const response = await httpClient.get(request.url, {
      params: request.params,
      headers: context.headers,
      signal,
      timeoutMs: context.timeoutMs
    });
    if (!response.ok) {
      return response;
    }

    const outcome = classifyResponse(request, response.value, now());
    switch (outcome.state) {
      case "success":
        return Ok(outcome.body);
      case "failed":
        logger.warn(outcome.error.message);
        return Err(outcome.error);
      case "retryable":
        break;
    }

    if (attempt === maxAttempts) break;

    const delayMs = computeRetryDelay(retry, attempt, outcome.retryAfterMs);
    logger.info(`${request.url} is not ready yet, retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts})`);
    if ((await sleep(delayMs, signal)) === "aborted") {
      return Err(new CancelledError(request.url));
    }
  }

  const timeout = new TimeoutError(request.url, maxAttempts);
  logger.warn(timeout.message);
  return Err(timeout);
}
