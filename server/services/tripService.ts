/**
 * Trip Service
 *
 * Save, select and delete operations behind the trip routes.
 * Routes should only call these functions - no inline logic.
 *
 * Every mutation reloads the whole store first and writes the whole store
 * back. Nothing read earlier in the session is trusted.
 */

import {
  NEW_TRIP_SENTINEL,
  emptyProfile,
  type TripProfile,
  type TripStoreState,
  type UserTrips,
} from "@shared/schema";
import { getUserTrips, setUserTrips, type ITripStore } from "../storage";
import { uniqueName } from "./tripNaming";
import { resetToNewTrip, type TripSession } from "./tripSession";

// ============================================================================
// TYPES
// ============================================================================

export type TripOperationResult<T extends object = object> =
  | ({ status: "ok"; message: string } & T)
  | { status: "invalid"; error: string }
  | { status: "not_found"; error: string }
  | { status: "storage_error"; error: string };

export type DeleteResult =
  | { deleted: true; state: TripStoreState }
  | { deleted: false; reason: "not_found" };

export const MISSING_TRIP_NAME = "Please enter a trip name before saving.";
export const NOTHING_TO_DELETE = "There is no saved trip to delete. Select a saved trip first.";
export const SELECTED_TRIP_NOT_FOUND = "Selected trip not found.";

// ============================================================================
// QUERIES
// ============================================================================

function hasTrip(userTrips: UserTrips, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(userTrips, name);
}

/** Saved trip names for the selector, sorted */
export async function listTripNames(store: ITripStore, username: string): Promise<string[]> {
  const state = await store.loadAll();
  return Object.keys(getUserTrips(username, state))
    .filter((name) => name !== NEW_TRIP_SENTINEL)
    .sort();
}

/**
 * Point the session at a saved trip, or at a blank one for the sentinel.
 * A name that has since disappeared also starts a blank trip.
 */
export async function selectTrip(store: ITripStore, session: TripSession, name: string): Promise<void> {
  session.confirmDelete = false;

  if (name === NEW_TRIP_SENTINEL) {
    resetToNewTrip(session);
    return;
  }

  const state = await store.loadAll();
  const userTrips = getUserTrips(session.username, state);
  const stored = hasTrip(userTrips, name) ? userTrips[name] : undefined;
  session.selectedTripName = name;
  session.currentTrip = stored ? { ...stored, trip_name: name } : emptyProfile();
}

// ============================================================================
// SAVE
// ============================================================================

/**
 * Persist the session's trip under a name no other trip of this user has.
 * Saving "Beach Week" twice stores "Beach Week" and "Beach Week (1)".
 */
export async function saveCurrentTrip(
  store: ITripStore,
  session: TripSession,
): Promise<TripOperationResult<{ savedAs: string }>> {
  const baseName = session.currentTrip.trip_name.trim();
  if (!baseName) {
    return { status: "invalid", error: MISSING_TRIP_NAME };
  }

  const state = await store.loadAll();
  const existing = getUserTrips(session.username, state);
  const savedAs = uniqueName(baseName, [...Object.keys(existing), NEW_TRIP_SENTINEL]);

  // fromEntries defines the key, so names like "__proto__" are stored too
  const trip: TripProfile = { ...session.currentTrip, trip_name: savedAs };
  const added: [string, TripProfile] = [savedAs, trip];
  const userTrips: UserTrips = Object.fromEntries([...Object.entries(existing), added]);

  const result = await store.saveAll(setUserTrips(session.username, userTrips, state));
  if (!result.success) {
    return { status: "storage_error", error: result.error };
  }

  session.currentTrip = trip;
  session.selectedTripName = savedAs;
  console.log(`[TripService] ${session.username} saved trip "${savedAs}"`);

  return { status: "ok", message: `Trip saved as: ${savedAs}`, savedAs };
}

// ============================================================================
// DELETE
// ============================================================================

/** Remove one trip from a user's map. Unknown names leave the store untouched */
export async function deleteTrip(store: ITripStore, username: string, name: string): Promise<DeleteResult> {
  const state = await store.loadAll();
  const userTrips = getUserTrips(username, state);

  if (!hasTrip(userTrips, name)) {
    return { deleted: false, reason: "not_found" };
  }

  const remaining: UserTrips = Object.fromEntries(
    Object.entries(userTrips).filter(([tripName]) => tripName !== name),
  );
  return { deleted: true, state: setUserTrips(username, remaining, state) };
}

/** First step of delete: arm the confirmation prompt */
export function requestDelete(session: TripSession): TripOperationResult {
  if (session.selectedTripName === NEW_TRIP_SENTINEL) {
    return { status: "invalid", error: NOTHING_TO_DELETE };
  }

  session.confirmDelete = true;
  return {
    status: "ok",
    message: `Are you sure you want to delete the trip '${session.selectedTripName}'? This cannot be undone.`,
  };
}

export function cancelDelete(session: TripSession): TripOperationResult {
  session.confirmDelete = false;
  return { status: "ok", message: "Delete cancelled." };
}

export async function confirmDelete(
  store: ITripStore,
  session: TripSession,
): Promise<TripOperationResult<{ deleted: string }>> {
  if (!session.confirmDelete) {
    return { status: "invalid", error: "Delete was not requested." };
  }

  const name = session.selectedTripName;
  const result = await deleteTrip(store, session.username, name);
  if (!result.deleted) {
    session.confirmDelete = false;
    return { status: "not_found", error: SELECTED_TRIP_NOT_FOUND };
  }

  const saved = await store.saveAll(result.state);
  if (!saved.success) {
    return { status: "storage_error", error: saved.error };
  }

  resetToNewTrip(session);
  console.log(`[TripService] ${session.username} deleted trip "${name}"`);

  return { status: "ok", message: `Trip '${name}' deleted.`, deleted: name };
}
