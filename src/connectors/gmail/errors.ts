/**
 * Gmail API error inspection and classification.
 *
 * googleapis surfaces failures as GaxiosError objects whose status lives in
 * `code`, `status` or `response.status` depending on where the request
 * failed, and whose machine-readable reasons sit in `errors[]` or in the
 * response body. OAuth token failures put an `error` string in the body.
 */

import type { InsertResult } from "../core/index.js";
import { errorMessage } from "../core/index.js";
import type { GmailErrorDetails } from "./types.js";

const RATE_LIMIT_REASONS = new Set([
  "rateLimitExceeded",
  "userRateLimitExceeded",
  "quotaExceeded",
]);

/** Token errors that mean the key or its delegation is unusable for everyone. */
const FATAL_REASONS = new Set(["unauthorized_client", "invalid_client"]);

function asObject(value: unknown): object | undefined {
  return typeof value === "object" && value !== null ? value : undefined;
}

function collectReasons(list: unknown, into: string[]): void {
  if (!Array.isArray(list)) return;
  const items: unknown[] = list;
  for (const item of items) {
    const entry = asObject(item);
    if (entry && "reason" in entry && typeof entry.reason === "string") {
      into.push(entry.reason);
    }
  }
}

export function inspectGmailError(err: unknown): GmailErrorDetails {
  const details: GmailErrorDetails = { reasons: [], message: errorMessage(err) };
  const obj = asObject(err);
  if (!obj) return details;

  const response = "response" in obj ? asObject(obj.response) : undefined;

  if ("status" in obj && typeof obj.status === "number") {
    details.status = obj.status;
  } else if ("code" in obj && typeof obj.code === "number") {
    details.status = obj.code;
  } else if (response && "status" in response && typeof response.status === "number") {
    details.status = response.status;
  }

  if ("code" in obj && typeof obj.code === "string") {
    if (/^\d{3}$/.test(obj.code)) {
      details.status ??= Number(obj.code);
    } else {
      details.code = obj.code;
    }
  }

  if ("errors" in obj) collectReasons(obj.errors, details.reasons);

  const data = response && "data" in response ? asObject(response.data) : undefined;
  if (data && "error" in data) {
    if (typeof data.error === "string") {
      details.reasons.push(data.error);
    } else {
      const body = asObject(data.error);
      if (body && "errors" in body) collectReasons(body.errors, details.reasons);
    }
  }

  const headers = response && "headers" in response ? asObject(response.headers) : undefined;
  if (headers && "retry-after" in headers && typeof headers["retry-after"] === "string") {
    const seconds = Number(headers["retry-after"]);
    if (Number.isFinite(seconds) && seconds >= 0) {
      details.retryAfterMs = seconds * 1000;
    }
  }

  return details;
}

export type GmailErrorClass =
  | Exclude<InsertResult, { kind: "inserted" }>
  | { kind: "fatal"; reason: string };

function describe(details: GmailErrorDetails): string {
  const prefix =
    details.status !== undefined
      ? `HTTP ${details.status}`
      : (details.code ?? "transport error");
  return `${prefix}: ${details.message}`;
}

/**
 * Map a failed Gmail call onto the engine's result kinds:
 *   - transport errors, 5xx, 429 and quota 403s → retriable
 *   - token/delegation problems for one user, other 401/403 → permanent, account-wide
 *   - other 4xx → permanent for this message
 *   - a key or delegation that is unusable for every account → fatal
 */
export function classifyGmailError(err: unknown): GmailErrorClass {
  const details = inspectGmailError(err);
  const reason = describe(details);
  const { status, reasons } = details;
  const lowered = details.message.toLowerCase();

  if (
    reasons.some((r) => FATAL_REASONS.has(r)) ||
    lowered.includes("unauthorized_client") ||
    lowered.includes("invalid jwt signature")
  ) {
    return { kind: "fatal", reason };
  }

  if (reasons.includes("invalid_grant") || lowered.includes("invalid_grant")) {
    return { kind: "permanent", reason, scope: "account" };
  }

  const rateLimited =
    status === 429 ||
    (status === 403 && reasons.some((r) => RATE_LIMIT_REASONS.has(r)));
  if (rateLimited) {
    return {
      kind: "retriable",
      reason,
      rateLimited: true,
      retryAfterMs: details.retryAfterMs,
    };
  }

  if (status === 401 || status === 403) {
    return { kind: "permanent", reason, scope: "account" };
  }

  if (status !== undefined && status >= 500) {
    return { kind: "retriable", reason, rateLimited: false };
  }

  if (status !== undefined && status >= 400) {
    return { kind: "permanent", reason, scope: "message" };
  }

  // No HTTP status: the request never got a response.
  return { kind: "retriable", reason, rateLimited: false };
}
