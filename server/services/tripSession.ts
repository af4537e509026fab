/**
 * Planner Sessions
 *
 * One session per logged-in browser. It owns the trip being edited until
 * the user saves it, so edits are not durable until Save.
 *
 * Lifecycle: created at login, kept for the session's duration,
 * discarded at logout or when it expires.
 */

import { randomBytes } from "crypto";
import { NEW_TRIP_SENTINEL, emptyProfile, type TripProfile } from "@shared/schema";

// ============================================================================
// CONFIGURATION
// ============================================================================

const SESSION_CONFIG = {
  maxSessions: 1000,
  ttlMs: 12 * 60 * 60 * 1000, // 12 hours
};

// ============================================================================
// TYPES
// ============================================================================

export interface TripSession {
  id: string;
  username: string;
  currentTrip: TripProfile;
  /** Saved trip name in the selector, or NEW_TRIP_SENTINEL */
  selectedTripName: string;
  itineraryText: string;
  /** Set between "Delete" and "Yes, delete this trip" */
  confirmDelete: boolean;
  createdAt: number;
}

interface SessionEntry {
  session: TripSession;
  accessedAt: number;
}

// ============================================================================
// STORE
// ============================================================================

/**
 * Sessions kept in memory with a size cap (least-recently-used eviction)
 * and an absolute TTL from creation.
 */
export class SessionStore {
  private sessions = new Map<string, SessionEntry>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: { maxSize?: number; ttlMs?: number; now?: () => number } = {}) {
    this.maxSize = opts.maxSize ?? SESSION_CONFIG.maxSessions;
    this.ttlMs = opts.ttlMs ?? SESSION_CONFIG.ttlMs;
    this.now = opts.now ?? Date.now;
  }

  create(username: string): TripSession {
    if (this.sessions.size >= this.maxSize) {
      this.evictLRU();
    }

    const createdAt = this.now();
    const session: TripSession = {
      id: randomBytes(32).toString("hex"),
      username,
      currentTrip: emptyProfile(),
      selectedTripName: NEW_TRIP_SENTINEL,
      itineraryText: "",
      confirmDelete: false,
      createdAt,
    };
    this.sessions.set(session.id, { session, accessedAt: createdAt });
    return session;
  }

  get(id: string): TripSession | undefined {
    const entry = this.sessions.get(id);
    if (!entry) return undefined;

    if (this.now() - entry.session.createdAt > this.ttlMs) {
      this.sessions.delete(id);
      return undefined;
    }

    entry.accessedAt = this.now();
    return entry.session;
  }

  discard(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictLRU(): void {
    let oldestId: string | null = null;
    let oldestAccess = Infinity;

    for (const [id, entry] of Array.from(this.sessions.entries())) {
      if (entry.accessedAt < oldestAccess) {
        oldestAccess = entry.accessedAt;
        oldestId = id;
      }
    }

    if (oldestId !== null) {
      this.sessions.delete(oldestId);
    }
  }
}

/** Put the session back on a blank, unselected trip */
export function resetToNewTrip(session: TripSession): void {
  session.selectedTripName = NEW_TRIP_SENTINEL;
  session.currentTrip = emptyProfile();
  session.confirmDelete = false;
}
