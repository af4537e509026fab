/**
 * Authentication Service
 * Static username/password login against the configured USERS map
 */

import type { UsersMap } from "../config";

// ============================================================================
// CONFIGURATION
// ============================================================================

export const SESSION_COOKIE = "session";

export const INVALID_CREDENTIALS = "Invalid username or password.";

// ============================================================================
// LOGIN
// ============================================================================

/** Trimmed, lower-cased form used as the storage key for a user */
export function normalizeUsername(username: string): string {
  return username.trim().toLowerCase();
}

/**
 * Check a login attempt. Usernames match case-insensitively, passwords
 * case-sensitively, and both are trimmed first.
 *
 * Returns the normalized username, or null when the login is rejected.
 */
export function authenticate(users: UsersMap, username: string, password: string): string | null {
  const uname = normalizeUsername(username);
  const pwd = password.trim();
  if (!uname) return null;

  const normalized = new Map<string, string>();
  for (const [name, stored] of Object.entries(users)) {
    normalized.set(name.toLowerCase(), stored);
  }

  const expected = normalized.get(uname);
  if (expected === undefined || expected !== pwd) {
    return null;
  }
  return uname;
}

/**
 * Session id from an Authorization bearer token, for API clients that do
 * not keep cookies.
 */
export function getBearerSessionId(headers: Record<string, string | string[] | undefined>): string | null {
  const authHeader = headers["authorization"];
  const token = Array.isArray(authHeader) ? authHeader[0] : authHeader;
  if (token && token.startsWith("Bearer ")) {
    return token.substring(7);
  }
  return null;
}
