import axios, { isAxiosError, isCancel } from "axios";

import type { AxiosInstance, AxiosRequestConfig } from "axios";

import { type HttpClient, type HttpRequestConfig, type HttpResponse } from "@/application/ports/http-client";
import { CancelledError, Err, Ok, TransportError } from "@/domain/error";

/**
 * Axiosはstatus codeが4xx, 5xxなら勝手にthrow Errorする
 * BGG の 202 / 4xx / 5xx はリトライ制御側で判定するので、ここでは決してthrowさせない
 * @link https://axios-http.com/docs/handling_errors
 */
export const neverThrowValidateStatus = (_status: number): boolean => true;

const toAxiosConfig = (config?: HttpRequestConfig): AxiosRequestConfig => {
  const axiosConfig: AxiosRequestConfig = { responseType: "arraybuffer" };

  if (config === undefined) {
    return axiosConfig;
  }
  if (config.headers !== undefined) {
    axiosConfig.headers = { ...config.headers };
  }
  if (config.params !== undefined) {
    axiosConfig.params = new URLSearchParams(config.params.map(([key, value]): [string, string] => [key, value]));
  }
  if (config.signal !== undefined) {
    axiosConfig.signal = config.signal;
  }
  if (config.timeoutMs !== undefined) {
    axiosConfig.timeout = config.timeoutMs;
  }

  return axiosConfig;
};

const toBytes = (data: unknown): Uint8Array => {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (typeof data === "string") {
    return new TextEncoder().encode(data);
  }
  return new Uint8Array(0);
};

const toHeaders = (headers: unknown): Record<string, string> => {
  const normalized: Record<string, string> = {};
  if (typeof headers !== "object" || headers === null) {
    return normalized;
  }

  const entries: Array<[string, unknown]> = Object.entries(headers);
  for (const [name, value] of entries) {
    if (value === undefined || value === null) continue;
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return normalized;
};

export function createAxiosHttpClient(config?: AxiosRequestConfig): HttpClient {
  const client: AxiosInstance = axios.create({
    ...config,
    validateStatus: neverThrowValidateStatus
  });

  return {
    get: async (url: string, requestConfig?: HttpRequestConfig) => {
      try {
        const response = await client.get<unknown>(url, toAxiosConfig(requestConfig));
        const httpResponse: HttpResponse<Uint8Array> = {
          data: toBytes(response.data),
          status: response.status,
          headers: toHeaders(response.headers)
        };
        return Ok(httpResponse);
      } catch (error) {
        if (isCancel(error) || requestConfig?.signal?.aborted === true) {
          return Err(new CancelledError(url));
        }
        if (isAxiosError(error)) {
          return Err(new TransportError(error.message || "HTTP request failed", error.config?.url ?? url, error));
        }

        const fallbackMessage = error instanceof Error ? error.message : String(error);
        return Err(new TransportError(fallbackMessage, url, error));
      }
    }
  };
}
