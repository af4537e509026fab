import { z } from "zod";

// ============================================================================
// VOCABULARIES
// ============================================================================

export const TRIP_DIRECTIONS = ["round_trip", "one_way"] as const;

export const DRIVING_PREFERENCES = ["mostly_driving", "balanced", "mostly_activities"] as const;

export const OVERNIGHT_STYLES = [
  "evenly_spread",
  "push_far_on_first_day",
  "short_first_day_then_even",
] as const;

export const LODGING_STYLES = ["budget", "mid_range", "upscale", "luxury_resort"] as const;

export const DISCOVERY_CATEGORIES = [
  "michelin_star_dining",
  "other_high_end_dining",
  "historic_black_culture_sites",
  "museums_and_culture",
  "waterfalls",
  "hiking_trails",
  "beaches_or_ocean_access",
  "lakes_and_waterfronts",
  "scenic_drives_or_overlooks",
  "theme_parks",
  "nightlife",
  "golf",
] as const;

export const PLANNING_FOCUSES = [
  "minimize_driving_time",
  "maximize_scenic_or_interesting_stops",
  "balanced",
] as const;

export const DETAIL_LEVELS = ["high_level_overview", "daily_outline", "detailed_daily_plan"] as const;

export const POI_KINDS = ["specific_stop", "city_or_region", "category_along_route"] as const;

export const POI_PRIORITIES = ["must_do", "nice_to_have"] as const;

export type TripDirection = (typeof TRIP_DIRECTIONS)[number];
export type DrivingPreference = (typeof DRIVING_PREFERENCES)[number];
export type OvernightStyle = (typeof OVERNIGHT_STYLES)[number];
export type LodgingStyle = (typeof LODGING_STYLES)[number];
export type DiscoveryCategory = (typeof DISCOVERY_CATEGORIES)[number];
export type PlanningFocus = (typeof PLANNING_FOCUSES)[number];
export type DetailLevel = (typeof DETAIL_LEVELS)[number];
export type PoiKind = (typeof POI_KINDS)[number];
export type PoiPriority = (typeof POI_PRIORITIES)[number];

/** Selector value meaning "no saved trip selected". Never stored as a trip name. */
export const NEW_TRIP_SENTINEL = "<New Trip>";

// ============================================================================
// POINTS OF INTEREST
// ============================================================================

export const pointOfInterestSchema = z.object({
  label: z.string(),
  poi_kind: z.enum(POI_KINDS),
  location_hint: z.string().nullable(),
  category: z.string().nullable(),
  details: z.string().nullable(),
  max_detour_hours: z.number().nullable(),
  min_time_on_site_hours: z.number().nullable(),
  priority: z.enum(POI_PRIORITIES),
});

export type PointOfInterest = z.infer<typeof pointOfInterestSchema>;

// ============================================================================
// TRIP PROFILE
// ============================================================================

// Key order here is the order of the serialized trip_config.
export const tripProfileSchema = z.object({
  trip_name: z.string(),
  origin: z.string(),
  destination: z.string(),
  trip_direction: z.enum(TRIP_DIRECTIONS),
  total_days_available: z.number().int(),
  max_daily_drive_hours: z.number(),
  driving_days_preference: z.enum(DRIVING_PREFERENCES),
  overnight_stop_distance_style: z.enum(OVERNIGHT_STYLES),
  overall_trip_budget: z.number().nullable(),
  lodging_budget_per_night: z.number().nullable(),
  food_budget_per_day_per_person: z.number().nullable(),
  lodging_style: z.enum(LODGING_STYLES),
  travelers_description: z.string(),
  mobility_or_special_needs: z.string(),
  auto_discovery_categories: z.array(z.enum(DISCOVERY_CATEGORIES)),
  default_max_detour_hours: z.number(),
  points_of_interest: z.array(pointOfInterestSchema),
  planning_focus: z.enum(PLANNING_FOCUSES),
  output_detail_level: z.enum(DETAIL_LEVELS),
});

export type TripProfile = z.infer<typeof tripProfileSchema>;

/** trip name -> profile, for one user */
export type UserTrips = Record<string, TripProfile>;

/** username -> that user's trips; the whole persisted file */
export type TripStoreState = Record<string, UserTrips>;

/**
 * Starter values for a new trip. No range checks happen here; the form
 * layer clamps values on the way in.
 */
export function emptyProfile(): TripProfile {
  return {
    trip_name: "",
    origin: "",
    destination: "",
    trip_direction: "round_trip",
    total_days_available: 10,
    max_daily_drive_hours: 5.0,
    driving_days_preference: "balanced",
    overnight_stop_distance_style: "evenly_spread",
    overall_trip_budget: null,
    lodging_budget_per_night: null,
    food_budget_per_day_per_person: null,
    lodging_style: "upscale",
    travelers_description: "2 adults, no kids",
    mobility_or_special_needs: "",
    auto_discovery_categories: [],
    default_max_detour_hours: 2.0,
    points_of_interest: [],
    planning_focus: "balanced",
    output_detail_level: "daily_outline",
  };
}

// ============================================================================
// PERSISTED FILE (lenient decode)
// ============================================================================

// A bad field in one stored record falls back to its default instead of
// failing the record.
const storedPoiSchema = z.object({
  label: z.string().catch(""),
  poi_kind: z.enum(POI_KINDS).catch("city_or_region"),
  location_hint: z.string().nullable().catch(null),
  category: z.string().nullable().catch(null),
  details: z.string().nullable().catch(null),
  max_detour_hours: z.number().nullable().catch(null),
  min_time_on_site_hours: z.number().nullable().catch(null),
  priority: z.enum(POI_PRIORITIES).catch("nice_to_have"),
});

function storedTripSchema() {
  const d = emptyProfile();
  return z.object({
    trip_name: z.string().catch(d.trip_name),
    origin: z.string().catch(d.origin),
    destination: z.string().catch(d.destination),
    trip_direction: z.enum(TRIP_DIRECTIONS).catch(d.trip_direction),
    total_days_available: z.number().int().catch(d.total_days_available),
    max_daily_drive_hours: z.number().catch(d.max_daily_drive_hours),
    driving_days_preference: z.enum(DRIVING_PREFERENCES).catch(d.driving_days_preference),
    overnight_stop_distance_style: z.enum(OVERNIGHT_STYLES).catch(d.overnight_stop_distance_style),
    overall_trip_budget: z.number().nullable().catch(null),
    lodging_budget_per_night: z.number().nullable().catch(null),
    food_budget_per_day_per_person: z.number().nullable().catch(null),
    lodging_style: z.enum(LODGING_STYLES).catch(d.lodging_style),
    travelers_description: z.string().catch(d.travelers_description),
    mobility_or_special_needs: z.string().catch(d.mobility_or_special_needs),
    auto_discovery_categories: z.array(z.enum(DISCOVERY_CATEGORIES)).catch([]),
    default_max_detour_hours: z.number().catch(d.default_max_detour_hours),
    points_of_interest: z.array(storedPoiSchema).catch([]),
    planning_focus: z.enum(PLANNING_FOCUSES).catch(d.planning_focus),
    output_detail_level: z.enum(DETAIL_LEVELS).catch(d.output_detail_level),
  });
}

const storedTrip = storedTripSchema();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface DecodedTripStore {
  state: TripStoreState;
  /** "user" or "user/trip" for entries that could not be read at all */
  skipped: string[];
}

/**
 * Decode the persisted file one entry at a time. A user whose value is not
 * a map, or a trip that is not an object, is skipped; everyone else loads.
 * Maps are rebuilt with Object.fromEntries so any string works as a key.
 *
 * Returns null when the top level is not a user-to-trips map.
 */
export function decodeTripStore(raw: unknown): DecodedTripStore | null {
  if (!isRecord(raw)) return null;

  const skipped: string[] = [];
  const users = Object.entries(raw).flatMap(([username, trips]) => {
    if (!isRecord(trips)) {
      skipped.push(username);
      return [];
    }

    const decoded = Object.entries(trips).flatMap(([name, trip]) => {
      const result = storedTrip.safeParse(trip);
      if (!result.success) {
        skipped.push(`${username}/${name}`);
        return [];
      }
      return [[name, result.data] as const];
    });

    return [[username, Object.fromEntries(decoded)] as const];
  });

  return { state: Object.fromEntries(users), skipped };
}

// ============================================================================
// API REQUEST BODIES
// ============================================================================

const optionalNumber = z.union([z.number(), z.string(), z.null()]).optional();

/** Partial form submission for the trip being edited. Values are clamped later. */
export const tripFormInputSchema = z
  .object({
    trip_name: z.string(),
    origin: z.string(),
    destination: z.string(),
    trip_direction: z.enum(TRIP_DIRECTIONS),
    total_days_available: optionalNumber,
    max_daily_drive_hours: optionalNumber,
    driving_days_preference: z.enum(DRIVING_PREFERENCES),
    overnight_stop_distance_style: z.enum(OVERNIGHT_STYLES),
    overall_trip_budget: optionalNumber,
    lodging_budget_per_night: optionalNumber,
    food_budget_per_day_per_person: optionalNumber,
    lodging_style: z.enum(LODGING_STYLES),
    travelers_description: z.string(),
    mobility_or_special_needs: z.string(),
    auto_discovery_categories: z.array(z.enum(DISCOVERY_CATEGORIES)),
    default_max_detour_hours: optionalNumber,
    planning_focus: z.enum(PLANNING_FOCUSES),
    output_detail_level: z.enum(DETAIL_LEVELS),
  })
  .partial();

export type TripFormInput = z.infer<typeof tripFormInputSchema>;

export const poiFormInputSchema = z
  .object({
    label: z.string(),
    poi_kind: z.enum(POI_KINDS),
    location_hint: z.string().nullable(),
    category: z.string().nullable(),
    details: z.string().nullable(),
    max_detour_hours: optionalNumber,
    min_time_on_site_hours: optionalNumber,
    priority: z.enum(POI_PRIORITIES),
  })
  .partial();

export type PoiFormInput = z.infer<typeof poiFormInputSchema>;

export const loginSchema = z.object({
  username: z.string().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
});

export const selectTripSchema = z.object({
  name: z.string().min(1, "Trip name is required"),
});
