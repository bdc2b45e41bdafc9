import { ApiResponseError, type ApiResponseErrorReason } from "@/domain/error";
import type { XmlElement } from "@/infrastructure/xml/xml-document";

export const API_ERROR_ROOTS = ["errors", "error"] as const;

const KNOWN_MESSAGES: ReadonlyMap<string, ApiResponseErrorReason> = new Map([
  ["Invalid username specified", "unknown-username"],
  ["Invalid collection subtype", "invalid-item-type"]
]);

export const isApiErrorRoot = (root: XmlElement): boolean => API_ERROR_ROOTS.some((name) => name === root.name);

/**
 * `<errors><error><message>…</message></error></errors>`, or a bare `<error>` on some endpoints.
 * A single recognised message keeps its own reason; anything else is `unknown`.
 */
export const decodeApiErrors = (root: XmlElement): ApiResponseError => {
  const errors = root.name === "error" ? [root] : root.children("error");
  const messages = errors
    .map((error) => error.child("message")?.text() ?? error.text())
    .filter((message) => message !== "");

  const reason = messages.length === 1 ? KNOWN_MESSAGES.get(messages[0]) : undefined;
  return new ApiResponseError(reason ?? "unknown", messages);
};
