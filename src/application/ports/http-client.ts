import type { CancelledError, Result, TransportError } from "@/domain/error";

/** Ordered key/value pairs; BGG reads some parameters positionally, so order is kept. */
export type HttpRequestParams = ReadonlyArray<readonly [string, string]>;

export type HttpRequestConfig = {
  readonly headers?: Readonly<Record<string, string>>;
  readonly params?: HttpRequestParams;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
};

export type HttpResponse<T> = {
  readonly data: T;
  readonly status: number;
  /** Header names are lower-cased. */
  readonly headers: Readonly<Record<string, string>>;
};

/**
 * Resolves with any status code the server sent; only failures to get a response at all
 * end up on the error side.
 */
export interface HttpClient {
  get(url: string, config?: HttpRequestConfig): Promise<Result<HttpResponse<Uint8Array>, TransportError | CancelledError>>;
}
