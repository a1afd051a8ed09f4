/**
 * Handshake authentication for the command channel.
 *
 * An IdentityProvider turns the bearer token presented when the WebSocket
 * opens into a Principal. It runs once per connection; every later message is
 * checked by the MessageAuthenticator instead.
 *
 * Built-in implementation:
 * - StaticTokenIdentityProvider: pre-shared tokens mapped to principals
 *
 * Token issuance and verification against a real identity service live
 * outside this process; implement IdentityProvider to plug one in.
 */

import type { IncomingMessage } from "node:http";
import type { Principal } from "./types.js";

// ============================================================================
// TYPES
// ============================================================================

export type AuthFailureCode = "MISSING_TOKEN" | "TOKEN_INVALID" | "TOKEN_EXPIRED";

/**
 * Authentication result returned by IdentityProvider.
 */
export type AuthResult =
  | { allowed: true; principal: Principal }
  | { allowed: false; code: AuthFailureCode; reason: string };

/**
 * Identity provider interface.
 *
 * @example
 * ```typescript
 * const provider: IdentityProvider = {
 *   authenticate: async (token) => {
 *     const claims = await verifyWithIssuer(token);
 *     if (!claims) return { allowed: false, code: "TOKEN_INVALID", reason: "Invalid token" };
 *     return { allowed: true, principal: { user_id: claims.sub, username: claims.name } };
 *   },
 * };
 * ```
 */
export interface IdentityProvider {
  /**
   * Resolve a raw bearer token to a principal.
   * Called once per handshake, never per command.
   */
  authenticate(rawToken: string, now?: number): Promise<AuthResult> | AuthResult;

  /**
   * Optional: Clean up resources when server shuts down.
   */
  dispose?(): Promise<void> | void;
}

// ============================================================================
// TOKEN EXTRACTION
// ============================================================================

const BEARER_PREFIX = "Bearer ";

/**
 * Read the handshake token from `?token=` or an `Authorization: Bearer` header.
 * The query parameter wins when both are present.
 */
export function extractToken(request: Pick<IncomingMessage, "url" | "headers">): string | undefined {
  const url = new URL(request.url ?? "/", "http://localhost");
  const fromQuery = url.searchParams.get("token");
  if (fromQuery) {
    return fromQuery;
  }

  const header = request.headers.authorization;
  const value = Array.isArray(header) ? header[0] : header;
  if (value?.startsWith(BEARER_PREFIX)) {
    const token = value.slice(BEARER_PREFIX.length).trim();
    return token.length > 0 ? token : undefined;
  }
  return undefined;
}

/**
 * Read the `?recovery_token=` handshake parameter used to resume a session.
 */
export function extractRecoveryToken(request: Pick<IncomingMessage, "url">): string | undefined {
  const url = new URL(request.url ?? "/", "http://localhost");
  return url.searchParams.get("recovery_token") ?? undefined;
}

// ============================================================================
// BUILT-IN IMPLEMENTATIONS
// ============================================================================

export interface StaticTokenEntry {
  principal: Principal;
  /** Epoch milliseconds after which the token is refused */
  expiresAt?: number;
}

/**
 * Pre-shared tokens, each mapped to a fixed principal.
 *
 * @example
 * ```typescript
 * const auth = new StaticTokenIdentityProvider(new Map([
 *   ["dev-token-alice", { principal: { user_id: "u-alice", username: "alice", workspace_id: "ws-1" } }],
 * ]));
 * ```
 */
export class StaticTokenIdentityProvider implements IdentityProvider {
  constructor(private readonly tokens: Map<string, StaticTokenEntry>) {}

  authenticate(rawToken: string, now = Date.now()): AuthResult {
    if (!rawToken) {
      return { allowed: false, code: "MISSING_TOKEN", reason: "Missing authentication token" };
    }

    const entry = this.tokens.get(rawToken);
    if (!entry) {
      return { allowed: false, code: "TOKEN_INVALID", reason: "Invalid token" };
    }
    if (entry.expiresAt !== undefined && now >= entry.expiresAt) {
      return { allowed: false, code: "TOKEN_EXPIRED", reason: "Token has expired" };
    }

    return { allowed: true, principal: { ...entry.principal } };
  }
}
