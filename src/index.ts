export {
  DEFAULT_BASE_URL,
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_RETRY_POLICY,
  type ClientConfig,
  type CollectionFilters,
  type PlayerCountRange,
  type RequestOptions,
  type RetryPolicy,
  type SearchOptions
} from "@/application/options";
export type { HttpClient, HttpRequestConfig, HttpRequestParams, HttpResponse } from "@/application/ports/http-client";
export type { Logger } from "@/application/ports/logger";
export {
  ApiResponseError,
  CancelledError,
  ConfigError,
  DecodeError,
  Err,
  HttpError,
  Ok,
  ParseError,
  TimeoutError,
  TransportError,
  isErr,
  isOk,
  mapOk,
  unwrap,
  type BggError,
  type BggErrorKind,
  type Result
} from "@/domain/error";
export { ENTITY_MODES, type EntityMode } from "@/domain/services/text-correction";
export * from "@/domain/types";
export { createAxiosHttpClient } from "@/infrastructure/ports/axios-http-client";
export { ConsoleLogger } from "@/infrastructure/logging/console-logger";
export { createBggClient, type BggClient, type BggClientDependencies, type BggResult } from "@/interface/client";
export { createClientConfig, type ClientConfigOverrides, type CreateClientConfigOptions } from "@/shared/config/env-config";
