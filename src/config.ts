/**
 * Channel configuration.
 *
 * Every setting has a default; `loadConfigFromEnv` overlays WORKTRACK_*
 * variables and reports all invalid ones at once.
 */

import type { StaticTokenEntry } from "./auth.js";
import type { LogLevel } from "./logger-types.js";
import { isLogLevel } from "./logger-types.js";
import { DEFAULT_COMMAND_LIMITS } from "./rate-limiter.js";

// ============================================================================
// CONFIG
// ============================================================================

export interface ChannelConfig {
  /** Listening port (default: 8080) */
  port: number;
  /** Listening host (default: 0.0.0.0) */
  host: string;
  /** Verify signed message envelopes (default: true) */
  securityEnabled: boolean;
  /** HMAC key for message signatures; at least 16 characters when security is enabled */
  secret: string;
  /** Accepted clock skew for signed messages (default: 300) */
  messageWindowSeconds: number;
  /** Lifetime of idempotency records (default: 300) */
  idempotencyTtlSeconds: number;
  /** Maximum idempotency records held (default: 10000) */
  idempotencyMaxRecords: number;
  /** Rate limit window (default: 60) */
  rateLimitWindowSeconds: number;
  /** Requests per principal per window (default: 100) */
  rateLimitMaxRequests: number;
  /** Per-command overrides of rateLimitMaxRequests */
  commandLimits: Record<string, number>;
  /** Connections idle longer than this are removed (default: 300) */
  staleTimeoutSeconds: number;
  /** Period of the cleanup sweeps (default: 60) */
  cleanupIntervalSeconds: number;
  /** Maximum concurrent connections (default: 1000) */
  maxConnections: number;
  /** Maximum concurrent connections per user (default: 10) */
  maxConnectionsPerUser: number;
  /** Maximum inbound message size in bytes (default: 1 MiB) */
  maxMessageBytes: number;
  /** Deadline for a collaborator call (default: 30000) */
  commandTimeoutMs: number;
  /** Grace period for graceful shutdown (default: 30000) */
  shutdownTimeoutMs: number;
  logLevel: LogLevel;
  /** Emit JSON lines instead of text (default: false) */
  logJson: boolean;
  /** Pre-shared handshake tokens */
  tokens: Map<string, StaticTokenEntry>;
}

export const DEFAULT_CONFIG: ChannelConfig = {
  port: 8080,
  host: "0.0.0.0",
  securityEnabled: true,
  secret: "",
  messageWindowSeconds: 300,
  idempotencyTtlSeconds: 300,
  idempotencyMaxRecords: 10_000,
  rateLimitWindowSeconds: 60,
  rateLimitMaxRequests: 100,
  commandLimits: { ...DEFAULT_COMMAND_LIMITS },
  staleTimeoutSeconds: 300,
  cleanupIntervalSeconds: 60,
  maxConnections: 1000,
  maxConnectionsPerUser: 10,
  maxMessageBytes: 1024 * 1024, // 1 MiB
  commandTimeoutMs: 30_000,
  shutdownTimeoutMs: 30_000,
  logLevel: "info",
  logJson: false,
  tokens: new Map(),
};

export const MIN_SECRET_LENGTH = 16;

// ============================================================================
// ERRORS
// ============================================================================

export interface ConfigIssue {
  variable: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.variable}: ${i.message}`).join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

type Env = Record<string, string | undefined>;

/**
 * Collects typed values from the environment, remembering every bad one.
 */
class EnvReader {
  readonly issues: ConfigIssue[] = [];

  constructor(private readonly env: Env) {}

  raw(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  }

  int(name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const value = this.raw(name);
    if (value === undefined) return fallback;
    if (!/^-?\d+$/.test(value)) {
      this.issues.push({ variable: name, message: `expected an integer, got "${value}"` });
      return fallback;
    }
    const parsed = parseInt(value, 10);
    if (parsed < min || parsed > max) {
      this.issues.push({ variable: name, message: `must be between ${min} and ${max}, got ${parsed}` });
      return fallback;
    }
    return parsed;
  }

  bool(name: string, fallback: boolean): boolean {
    const value = this.raw(name)?.toLowerCase();
    if (value === undefined) return fallback;
    if (value === "true" || value === "1" || value === "yes") return true;
    if (value === "false" || value === "0" || value === "no") return false;
    this.issues.push({ variable: name, message: `expected true or false, got "${value}"` });
    return fallback;
  }
}

/**
 * Parse `token:userId:username[:workspaceId]` entries separated by commas.
 */
export function parseTokenList(value: string): { tokens: Map<string, StaticTokenEntry>; errors: string[] } {
  const tokens = new Map<string, StaticTokenEntry>();
  const errors: string[] = [];

  for (const item of value.split(",")) {
    const entry = item.trim();
    if (entry === "") continue;
    const [token, userId, username, workspaceId, ...rest] = entry.split(":");
    if (!token || !userId || !username || rest.length > 0) {
      errors.push(`malformed entry "${entry}" (expected token:userId:username[:workspaceId])`);
      continue;
    }
    tokens.set(token, {
      principal: workspaceId
        ? { user_id: userId, username, workspace_id: workspaceId }
        : { user_id: userId, username },
    });
  }

  return { tokens, errors };
}

/**
 * Parse `command=limit` pairs separated by commas.
 */
function parseCommandLimits(value: string): { limits: Record<string, number>; errors: string[] } {
  const limits: Record<string, number> = {};
  const errors: string[] = [];

  for (const item of value.split(",")) {
    const entry = item.trim();
    if (entry === "") continue;
    const [command, limit] = entry.split("=");
    const parsed = limit !== undefined && /^\d+$/.test(limit.trim()) ? parseInt(limit, 10) : NaN;
    if (!command || !(parsed > 0)) {
      errors.push(`malformed entry "${entry}" (expected command=limit)`);
      continue;
    }
    limits[command.trim()] = parsed;
  }

  return { limits, errors };
}

/**
 * Build a ChannelConfig from WORKTRACK_* variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfigFromEnv(env: Env = process.env): ChannelConfig {
  const read = new EnvReader(env);
  const d = DEFAULT_CONFIG;

  const config: ChannelConfig = {
    port: read.int("WORKTRACK_PORT", d.port, 1, 65535),
    host: read.raw("WORKTRACK_HOST") ?? d.host,
    securityEnabled: read.bool("WORKTRACK_SECURITY_ENABLED", d.securityEnabled),
    secret: read.raw("WORKTRACK_SECRET") ?? d.secret,
    messageWindowSeconds: read.int("WORKTRACK_MESSAGE_WINDOW_SECONDS", d.messageWindowSeconds, 1),
    idempotencyTtlSeconds: read.int("WORKTRACK_IDEMPOTENCY_TTL_SECONDS", d.idempotencyTtlSeconds, 1),
    idempotencyMaxRecords: read.int("WORKTRACK_IDEMPOTENCY_MAX_RECORDS", d.idempotencyMaxRecords, 1),
    rateLimitWindowSeconds: read.int("WORKTRACK_RATE_LIMIT_WINDOW_SECONDS", d.rateLimitWindowSeconds, 1),
    rateLimitMaxRequests: read.int("WORKTRACK_RATE_LIMIT_MAX_REQUESTS", d.rateLimitMaxRequests, 1),
    commandLimits: { ...d.commandLimits },
    staleTimeoutSeconds: read.int("WORKTRACK_STALE_TIMEOUT_SECONDS", d.staleTimeoutSeconds, 1),
    cleanupIntervalSeconds: read.int("WORKTRACK_CLEANUP_INTERVAL_SECONDS", d.cleanupIntervalSeconds, 1),
    maxConnections: read.int("WORKTRACK_MAX_CONNECTIONS", d.maxConnections, 1),
    maxConnectionsPerUser: read.int("WORKTRACK_MAX_CONNECTIONS_PER_USER", d.maxConnectionsPerUser, 1),
    maxMessageBytes: read.int("WORKTRACK_MAX_MESSAGE_BYTES", d.maxMessageBytes, 1),
    commandTimeoutMs: read.int("WORKTRACK_COMMAND_TIMEOUT_MS", d.commandTimeoutMs, 1),
    shutdownTimeoutMs: read.int("WORKTRACK_SHUTDOWN_TIMEOUT_MS", d.shutdownTimeoutMs, 1),
    logLevel: d.logLevel,
    logJson: read.bool("WORKTRACK_LOG_JSON", d.logJson),
    tokens: new Map(d.tokens),
  };

  const logLevel = read.raw("WORKTRACK_LOG_LEVEL");
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      read.issues.push({ variable: "WORKTRACK_LOG_LEVEL", message: `unknown level "${logLevel}"` });
    }
  }

  const limits = read.raw("WORKTRACK_COMMAND_LIMITS");
  if (limits !== undefined) {
    const parsed = parseCommandLimits(limits);
    Object.assign(config.commandLimits, parsed.limits);
    for (const message of parsed.errors) read.issues.push({ variable: "WORKTRACK_COMMAND_LIMITS", message });
  }

  const tokens = read.raw("WORKTRACK_TOKENS");
  if (tokens !== undefined) {
    const parsed = parseTokenList(tokens);
    config.tokens = parsed.tokens;
    for (const message of parsed.errors) read.issues.push({ variable: "WORKTRACK_TOKENS", message });
  }

  const issues = [...read.issues, ...validateConfig(config)];
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return config;
}

/**
 * Cross-field checks that apply however the config was built.
 */
export function validateConfig(config: ChannelConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  if (config.securityEnabled && config.secret.length < MIN_SECRET_LENGTH) {
    issues.push({
      variable: "WORKTRACK_SECRET",
      message: `must be at least ${MIN_SECRET_LENGTH} characters when security is enabled`,
    });
  }
  if (config.maxConnectionsPerUser > config.maxConnections) {
    issues.push({
      variable: "WORKTRACK_MAX_CONNECTIONS_PER_USER",
      message: "must not exceed WORKTRACK_MAX_CONNECTIONS",
    });
  }
  return issues;
}
