/**
 * Message authentication: HMAC-SHA256 signatures with expiry and replay protection.
 *
 * The signed string is
 *   message_id:timestamp:nonce:canonical_json(payload):sender_principal_id
 * keyed with the server secret. Canonical JSON sorts object keys, so a payload
 * that was parsed and re-serialised still verifies.
 *
 * verify() checks in this order and stops at the first failure:
 *   format → expiry → replay → signature → principal → record
 *
 * Recording happens synchronously before verify() returns, so two copies of
 * one message can never both pass. An id is remembered until no server clock
 * inside the window could accept its timestamp again. When the replay set is
 * full of such ids, new messages are refused (ReplayStoreFull) rather than
 * forgetting one.
 */

import { createHmac, randomBytes, randomUUID, timingSafeEqual } from "node:crypto";
import { BoundedMap } from "./bounded-map.js";
import { createCommandError } from "./error-mapper.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { isRecord, looksLikeSecureMessage } from "./type-guards.js";
import type { CommandError, ErrorCode, JsonValue, SecureMessage } from "./types.js";

// ============================================================================
// TYPES
// ============================================================================

export type SecurityError =
  | {
      kind: "MessageExpired";
      message_timestamp: number;
      server_timestamp: number;
      difference_seconds: number;
      window_seconds: number;
    }
  | { kind: "ReplayAttack"; message_id: string }
  | { kind: "InvalidSignature" }
  | { kind: "InvalidMessageFormat"; reason: string }
  | { kind: "PrincipalMismatch"; expected: string; actual: string };

export type SecurityErrorKind = SecurityError["kind"];

/** A valid message that could not be recorded. Retryable; not a security failure. */
export interface ReplayStoreFullError {
  kind: "ReplayStoreFull";
  retry_after_seconds: number;
}

export type VerifyError = SecurityError | ReplayStoreFullError;

export type VerifyResult = { ok: true; message: SecureMessage } | { ok: false; error: VerifyError };

export function isSecurityError(error: VerifyError): error is SecurityError {
  return error.kind !== "ReplayStoreFull";
}

export interface MessageAuthenticatorConfig {
  /** HMAC key */
  secret: string;
  /** Accepted clock skew in either direction, seconds (default: 300) */
  windowSeconds?: number;
  /** Cap on remembered message ids (default: 100000) */
  maxTrackedMessages?: number;
  /** Replay sweep interval in milliseconds (default: 60000) */
  cleanupIntervalMs?: number;
}

export interface MessageAuthenticatorStats {
  trackedMessages: number;
  verified: number;
  rejected: Record<VerifyError["kind"], number>;
  windowSeconds: number;
}

const DEFAULT_WINDOW_SECONDS = 300;
const DEFAULT_MAX_TRACKED = 100_000;
const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;
const MAX_FIELD_LENGTH = 256;
const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/i;

// ============================================================================
// CANONICAL JSON
// ============================================================================

/**
 * Serialise with object keys sorted at every depth.
 * Undefined object members are omitted and undefined array items become null,
 * as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? "null" : canonicalJson(item))).join(",")}]`;
  }
  if (isRecord(value)) {
    const parts: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const member = value[key];
      if (member !== undefined) {
        parts.push(`${JSON.stringify(key)}:${canonicalJson(member)}`);
      }
    }
    return `{${parts.join(",")}}`;
  }
  return JSON.stringify(value ?? null);
}

// ============================================================================
// AUTHENTICATOR
// ============================================================================

export class MessageAuthenticator {
  private readonly secret: string;
  private readonly windowSeconds: number;
  private readonly seen: BoundedMap<string, number>;
  private readonly logger: Logger;

  private verified = 0;
  private readonly rejected: Record<VerifyError["kind"], number> = {
    MessageExpired: 0,
    ReplayAttack: 0,
    InvalidSignature: 0,
    InvalidMessageFormat: 0,
    PrincipalMismatch: 0,
    ReplayStoreFull: 0,
  };

  constructor(config: MessageAuthenticatorConfig, logger: Logger = new NoOpLogger()) {
    if (config.secret.length === 0) {
      throw new Error("MessageAuthenticator requires a non-empty secret");
    }
    this.secret = config.secret;
    this.windowSeconds =
      typeof config.windowSeconds === "number" && config.windowSeconds > 0
        ? config.windowSeconds
        : DEFAULT_WINDOW_SECONDS;
    // Each id gets its own lifetime in verify(); this is the longest one.
    this.seen = new BoundedMap({
      ttlMs: (this.windowSeconds * 2 + 1) * 1000,
      maxSize:
        typeof config.maxTrackedMessages === "number" && config.maxTrackedMessages > 0
          ? config.maxTrackedMessages
          : DEFAULT_MAX_TRACKED,
      cleanupIntervalMs:
        typeof config.cleanupIntervalMs === "number" && config.cleanupIntervalMs > 0
          ? config.cleanupIntervalMs
          : DEFAULT_CLEANUP_INTERVAL_MS,
    });
    this.logger = logger;
  }

  /**
   * Wrap a payload in a signed envelope.
   */
  sign(payload: JsonValue, senderPrincipalId: string, now = Date.now()): SecureMessage {
    const message_id = randomUUID();
    const timestamp = Math.floor(now / 1000);
    const nonce = randomBytes(16).toString("hex");
    return {
      message_id,
      timestamp,
      nonce,
      signature: this.computeSignature(message_id, timestamp, nonce, payload, senderPrincipalId),
      payload,
      sender_principal_id: senderPrincipalId,
    };
  }

  /**
   * Verify an envelope and consume its message id.
   *
   * @param expectedPrincipalId - principal bound to the connection; the sender must match
   */
  verify(message: unknown, expectedPrincipalId?: string, now = Date.now()): VerifyResult {
    const result = this.check(message, expectedPrincipalId, now);
    if (!result.ok) {
      this.rejected[result.error.kind]++;
      this.logger.warn("Message rejected", { reason: result.error.kind });
      return result;
    }

    // The timestamp passes the expiry check while floor(now / 1000) <= timestamp + window.
    const { message_id, timestamp } = result.message;
    const rememberMs = (timestamp + this.windowSeconds + 1) * 1000 - now;
    if (!this.seen.set(message_id, timestamp, now, rememberMs)) {
      this.rejected.ReplayStoreFull++;
      const retryAfter = this.retryAfterSeconds(now);
      this.logger.warn("Replay store full; refusing message", { tracked: this.seen.size, retryAfter });
      return { ok: false, error: { kind: "ReplayStoreFull", retry_after_seconds: retryAfter } };
    }
    this.verified++;
    return result;
  }

  /**
   * Remove message ids older than the replay horizon. Returns the count removed.
   */
  cleanupExpired(now = Date.now()): number {
    return this.seen.cleanup(now);
  }

  startPeriodicCleanup(): void {
    this.seen.startPeriodicCleanup();
  }

  stopPeriodicCleanup(): void {
    this.seen.stopPeriodicCleanup();
  }

  getStats(): MessageAuthenticatorStats {
    return {
      trackedMessages: this.seen.size,
      verified: this.verified,
      rejected: { ...this.rejected },
      windowSeconds: this.windowSeconds,
    };
  }

  // ==========================================================================
  // PRIVATE
  // ==========================================================================

  private check(raw: unknown, expectedPrincipalId: string | undefined, now: number): VerifyResult {
    const format = this.checkFormat(raw);
    if (!format.ok) {
      return { ok: false, error: { kind: "InvalidMessageFormat", reason: format.reason } };
    }
    const message = format.message;

    const serverTimestamp = Math.floor(now / 1000);
    const difference = Math.abs(serverTimestamp - message.timestamp);
    if (difference > this.windowSeconds) {
      return {
        ok: false,
        error: {
          kind: "MessageExpired",
          message_timestamp: message.timestamp,
          server_timestamp: serverTimestamp,
          difference_seconds: difference,
          window_seconds: this.windowSeconds,
        },
      };
    }

    if (this.seen.has(message.message_id, now)) {
      return { ok: false, error: { kind: "ReplayAttack", message_id: message.message_id } };
    }

    const expected = this.computeSignature(
      message.message_id,
      message.timestamp,
      message.nonce,
      message.payload,
      message.sender_principal_id
    );
    if (!this.signaturesMatch(message.signature, expected)) {
      return { ok: false, error: { kind: "InvalidSignature" } };
    }

    if (expectedPrincipalId !== undefined && message.sender_principal_id !== expectedPrincipalId) {
      return {
        ok: false,
        error: { kind: "PrincipalMismatch", expected: expectedPrincipalId, actual: message.sender_principal_id },
      };
    }

    return { ok: true, message };
  }

  private retryAfterSeconds(now: number): number {
    const next = this.seen.nextExpiry() ?? now + this.windowSeconds * 1000;
    return Math.max(1, Math.ceil((next - now) / 1000));
  }

  private checkFormat(message: unknown): { ok: true; message: SecureMessage } | { ok: false; reason: string } {
    if (!looksLikeSecureMessage(message)) {
      return {
        ok: false,
        reason: "Envelope must have message_id, timestamp, nonce, signature, payload and sender_principal_id",
      };
    }
    if (message.message_id.length === 0 || message.message_id.length > MAX_FIELD_LENGTH) {
      return { ok: false, reason: "message_id must be a non-empty string" };
    }
    if (!Number.isInteger(message.timestamp) || message.timestamp < 0) {
      return { ok: false, reason: "timestamp must be a non-negative integer of unix seconds" };
    }
    if (message.nonce.length === 0 || message.nonce.length > MAX_FIELD_LENGTH) {
      return { ok: false, reason: "nonce must be a non-empty string" };
    }
    if (!SIGNATURE_PATTERN.test(message.signature)) {
      return { ok: false, reason: "signature must be a hex HMAC-SHA256 digest" };
    }
    if (message.sender_principal_id.length === 0 || message.sender_principal_id.length > MAX_FIELD_LENGTH) {
      return { ok: false, reason: "sender_principal_id must be a non-empty string" };
    }
    return { ok: true, message };
  }

  private computeSignature(
    messageId: string,
    timestamp: number,
    nonce: string,
    payload: JsonValue,
    senderPrincipalId: string
  ): string {
    const signed = `${messageId}:${timestamp}:${nonce}:${canonicalJson(payload)}:${senderPrincipalId}`;
    return createHmac("sha256", this.secret).update(signed).digest("hex");
  }

  private signaturesMatch(actual: string, expected: string): boolean {
    const actualBuffer = Buffer.from(actual.toLowerCase(), "hex");
    const expectedBuffer = Buffer.from(expected, "hex");
    return actualBuffer.length === expectedBuffer.length && timingSafeEqual(actualBuffer, expectedBuffer);
  }
}

// ============================================================================
// WIRE MAPPING
// ============================================================================

const VERIFY_ERROR_CODES: Record<VerifyError["kind"], ErrorCode> = {
  MessageExpired: "MESSAGE_EXPIRED",
  ReplayAttack: "REPLAY_ATTACK",
  InvalidSignature: "INVALID_SIGNATURE",
  InvalidMessageFormat: "INVALID_MESSAGE_FORMAT",
  PrincipalMismatch: "PRINCIPAL_MISMATCH",
  ReplayStoreFull: "SERVICE_UNAVAILABLE",
};

/**
 * Map a verification failure to its wire error. Security failures are sent
 * before the connection closes; ReplayStoreFull is an ordinary retryable error.
 */
export function securityErrorToCommandError(error: VerifyError): CommandError {
  const code = VERIFY_ERROR_CODES[error.kind];
  switch (error.kind) {
    case "MessageExpired":
      return createCommandError(code, "Message timestamp is outside the accepted window", {
        details: {
          message_timestamp: error.message_timestamp,
          server_timestamp: error.server_timestamp,
          difference_seconds: error.difference_seconds,
          window_seconds: error.window_seconds,
        },
      });
    case "ReplayAttack":
      return createCommandError(code, "Message has already been processed", {
        details: { message_id: error.message_id },
      });
    case "InvalidSignature":
      return createCommandError(code, "Message signature is invalid");
    case "InvalidMessageFormat":
      return createCommandError(code, error.reason);
    case "PrincipalMismatch":
      return createCommandError(code, "Message sender does not match the authenticated principal");
    case "ReplayStoreFull":
      return createCommandError(code, "Too many recent messages to track; retry later", {
        retryAfter: error.retry_after_seconds,
      });
  }
}
