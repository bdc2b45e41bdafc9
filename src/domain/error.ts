export type Result<T, E extends Error> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly err?: null | undefined;
}

export interface Err<E extends Error> {
  readonly ok: false;
  readonly value?: null | undefined;
  readonly err: E;
}

export function isOk<T, E extends Error>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

export function isErr<T, E extends Error>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

export function Ok<T>(value: T): Ok<T> {
  return { ok: true, err: null, value };
}

export function Err<E extends Error>(err: E): Err<E> {
  return { ok: false, value: null, err };
}

export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.ok === true) {
    return result.value;
  }
  throw result.err;
}

export function mapOk<T, U, E extends Error>(result: Result<T, E>, f: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(f(result.value)) : result;
}

/**
 * Every failure the client can hand back to a caller.
 * Switch on `kind` to tell them apart.
 */
export type BggError =
  | TransportError
  | HttpError
  | TimeoutError
  | ParseError
  | DecodeError
  | CancelledError
  | ApiResponseError;

export type BggErrorKind = BggError["kind"];

export class BaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class TransportError extends BaseError {
  readonly kind = "transport";

  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(`Transport Error: ${message} for ${url}`, { cause });
  }
}

export type HttpErrorContext = {
  readonly message: string;
  readonly url: string;
  readonly status: number;
};

export class HttpError extends BaseError {
  readonly kind = "http";
  readonly status: number;
  readonly url: string;

  constructor(context: HttpErrorContext) {
    super(`HTTP Error: ${context.message} (Status: ${context.status}) for ${context.url}`);
    this.status = context.status;
    this.url = context.url;
  }
}

export class TimeoutError extends BaseError {
  readonly kind = "timeout";

  constructor(
    public readonly url: string,
    public readonly attempts: number
  ) {
    super(`Timeout Error: data still not ready after ${attempts} attempts for ${url}`);
  }
}

export class ParseError extends BaseError {
  readonly kind = "parse";

  constructor(
    message: string,
    public readonly fragment: string
  ) {
    super(`Parse Error: ${message}${fragment ? ` near "${fragment}"` : ""}`);
  }
}

export type DecodeErrorReason = "missing-field" | "invalid-number" | "unexpected-value";

export type DecodeErrorContext = {
  readonly reason: DecodeErrorReason;
  readonly field: string;
  readonly element: string;
  readonly rawValue?: string;
};

export class DecodeError extends BaseError {
  readonly kind = "decode";
  readonly reason: DecodeErrorReason;
  readonly field: string;
  readonly element: string;
  readonly rawValue: string | undefined;

  constructor(context: DecodeErrorContext) {
    super(`Decode Error: ${describeDecodeFailure(context)}`);
    this.reason = context.reason;
    this.field = context.field;
    this.element = context.element;
    this.rawValue = context.rawValue;
  }

  static missingField(field: string, element: string): DecodeError {
    return new DecodeError({ reason: "missing-field", field, element });
  }

  static invalidNumber(field: string, element: string, rawValue: string): DecodeError {
    return new DecodeError({ reason: "invalid-number", field, element, rawValue });
  }

  static unexpectedValue(field: string, element: string, rawValue: string): DecodeError {
    return new DecodeError({ reason: "unexpected-value", field, element, rawValue });
  }
}

const describeDecodeFailure = ({ reason, field, element, rawValue }: DecodeErrorContext): string => {
  switch (reason) {
    case "missing-field":
      return `missing field "${field}" in <${element}>`;
    case "invalid-number":
      return `field "${field}" in <${element}> is not a number: "${rawValue ?? ""}"`;
    case "unexpected-value":
      return `field "${field}" in <${element}> has an unexpected value: "${rawValue ?? ""}"`;
  }
};

export class CancelledError extends BaseError {
  readonly kind = "cancelled";

  constructor(public readonly url: string) {
    super(`Request cancelled: ${url}`);
  }
}

export type ApiResponseErrorReason = "unknown-username" | "invalid-item-type" | "unknown";

export class ApiResponseError extends BaseError {
  readonly kind = "api";

  constructor(
    public readonly reason: ApiResponseErrorReason,
    public readonly messages: readonly string[]
  ) {
    super(`API Error: ${describeApiMessages(messages)}`);
  }
}

const describeApiMessages = (messages: readonly string[]): string => {
  if (messages.length === 0) return "got error from API with no message";
  return messages.join(", ");
};

/** Thrown while building a client; never returned from a request. */
export class ConfigError extends BaseError {
  readonly kind = "config";

  constructor(
    message: string,
    public readonly key?: string,
    cause?: unknown
  ) {
    super(`Configuration Error: ${message}`, { cause });
  }
}
