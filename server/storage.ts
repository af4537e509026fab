import { promises as fs } from "fs";
import * as path from "path";
import { randomBytes } from "crypto";
import {
  decodeTripStore,
  type TripStoreState,
  type UserTrips,
} from "@shared/schema";
import { getConfig, type AppConfig } from "./config";

export type SaveResult = { success: true } | { success: false; error: string };

/**
 * Whole-state trip persistence. Callers reload before every mutation and
 * write the full state back; there is no locking, so two sessions for the
 * same user race and the last write wins.
 */
export interface ITripStore {
  /** Never throws. Missing or unreadable state loads as {} */
  loadAll(): Promise<TripStoreState>;
  /** Never throws. Failures come back in the result */
  saveAll(state: TripStoreState): Promise<SaveResult>;
}

// ============================================================================
// STATE HELPERS
// ============================================================================

export function getUserTrips(username: string, state: TripStoreState): UserTrips {
  return Object.prototype.hasOwnProperty.call(state, username) ? state[username] : {};
}

// defineProperty rather than assignment: a username such as "__proto__"
// must become a key, not replace the prototype
export function setUserTrips(username: string, userTrips: UserTrips, state: TripStoreState): TripStoreState {
  Object.defineProperty(state, username, {
    value: userTrips,
    enumerable: true,
    writable: true,
    configurable: true,
  });
  return state;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// JSON FILE STORE
// ============================================================================

export class JsonFileTripStore implements ITripStore {
  constructor(private readonly filePath: string) {}

  async loadAll(): Promise<TripStoreState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (!isNotFound(err)) {
        console.warn(`[TripStore] Could not read ${this.filePath}: ${errorMessage(err)}`);
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.warn(`[TripStore] ${this.filePath} is not valid JSON, starting empty: ${errorMessage(err)}`);
      return {};
    }

    const decoded = decodeTripStore(parsed);
    if (!decoded) {
      console.warn(`[TripStore] ${this.filePath} has an unexpected shape, starting empty`);
      return {};
    }
    if (decoded.skipped.length > 0) {
      console.warn(`[TripStore] Skipped unreadable entries in ${this.filePath}: ${decoded.skipped.join(", ")}`);
    }
    return decoded.state;
  }

  async saveAll(state: TripStoreState): Promise<SaveResult> {
    // Write beside the target, then rename over it, so readers never see a partial file
    const tempPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${randomBytes(6).toString("hex")}.tmp`,
    );

    try {
      await fs.writeFile(tempPath, JSON.stringify(state, null, 2), "utf8");
      await fs.rename(tempPath, this.filePath);
      return { success: true };
    } catch (err) {
      console.error(`[TripStore] Error saving trips to ${this.filePath}:`, err);
      await fs.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        console.error(`[TripStore] Could not remove ${tempPath}:`, cleanupErr);
      });
      return { success: false, error: `Error saving trips: ${errorMessage(err)}` };
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

// ============================================================================
// IN-MEMORY STORE
// ============================================================================

// For local runs without a writable disk, and for tests. State is copied
// in and out so callers never share references with the stored copy.
export class InMemoryTripStore implements ITripStore {
  private state: TripStoreState;

  constructor(initial: TripStoreState = {}) {
    this.state = structuredClone(initial);
  }

  async loadAll(): Promise<TripStoreState> {
    return structuredClone(this.state);
  }

  async saveAll(state: TripStoreState): Promise<SaveResult> {
    this.state = structuredClone(state);
    return { success: true };
  }
}

export function createTripStore(config: AppConfig = getConfig()): ITripStore {
  if (config.USE_IN_MEMORY_STORE) {
    console.log("[TripStore] Using in-memory trip store");
    return new InMemoryTripStore();
  }
  return new JsonFileTripStore(path.resolve(config.TRIPS_DATA_FILE));
}
