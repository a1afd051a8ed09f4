/**
 * Type guards and accessors for commands, responses and raw JSON.
 */

import type { Command, JsonObject, JsonValue, SecureMessage } from "./types.js";

// =============================================================================
// RAW VALUES
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard: true if the value is representable as JSON without loss.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Type guard: true if the value has the shape of a signed envelope.
 * Field contents are checked by the authenticator.
 */
export function looksLikeSecureMessage(value: unknown): value is SecureMessage {
  return (
    isRecord(value) &&
    typeof value.message_id === "string" &&
    typeof value.timestamp === "number" &&
    typeof value.nonce === "string" &&
    typeof value.signature === "string" &&
    typeof value.sender_principal_id === "string" &&
    "payload" in value &&
    isJsonValue(value.payload)
  );
}

// =============================================================================
// COMMAND ACCESSORS
// =============================================================================

/**
 * Best-effort command type from an unvalidated payload, for error responses.
 */
export function peekCommandType(raw: unknown): string {
  return isRecord(raw) && typeof raw.type === "string" ? raw.type : "unknown";
}

/**
 * Best-effort request id from an unvalidated payload, for error responses.
 */
export function peekRequestId(raw: unknown): string | undefined {
  return isRecord(raw) && typeof raw.request_id === "string" ? raw.request_id : undefined;
}

/**
 * Best-effort idempotency key from an unvalidated payload, for error responses.
 */
export function peekIdempotencyKey(raw: unknown): string | undefined {
  return isRecord(raw) && typeof raw.idempotency_key === "string" ? raw.idempotency_key : undefined;
}

export function getCommandIdempotencyKey(cmd: Command): string | undefined {
  return typeof cmd.idempotency_key === "string" && cmd.idempotency_key.length > 0
    ? cmd.idempotency_key
    : undefined;
}

/**
 * Paging parameters of a query command, if it has any.
 */
export function getCommandPaging(cmd: Command): { limit?: number; offset?: number } | undefined {
  switch (cmd.type) {
    case "query_labels":
    case "query_projects":
    case "query_issues":
      return cmd.filters;
    default:
      return undefined;
  }
}

// =============================================================================
// RESULT SHAPES
// =============================================================================

/**
 * A page of results returned by a query collaborator.
 */
export interface PageResult extends JsonObject {
  items: JsonValue[];
  total: number;
}

export function isPageResult(value: JsonValue): value is PageResult {
  return isRecord(value) && Array.isArray(value.items) && typeof value.total === "number";
}
