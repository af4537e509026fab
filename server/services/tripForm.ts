/**
 * Trip Form Coercion
 *
 * Applies submitted form values to the trip being edited. Numbers are
 * clamped to the layout's bounds, zero budgets become null, and empty
 * optional strings become null. Nothing here touches the store.
 */

import {
  DISCOVERY_CATEGORIES,
  type DiscoveryCategory,
  type PoiFormInput,
  type PointOfInterest,
  type TripFormInput,
  type TripProfile,
} from "@shared/schema";
import { POI_BOUNDS, TRIP_BOUNDS, clampNumber, type NumberBounds } from "@shared/tripFields";

// ============================================================================
// TYPES
// ============================================================================

export type FormResult<T> = { ok: true; value: T } | { ok: false; error: string };

export const MISSING_STOP_TITLE = "Please give the stop a title.";
export const STOP_NOT_FOUND = "Stop not found.";

// ============================================================================
// TRIP FIELDS
// ============================================================================

/** Clamp a required numeric field; unusable input keeps the current value */
function requiredNumber(raw: unknown, bounds: NumberBounds, current: number): number {
  if (raw === undefined) return current;
  return clampNumber(raw, bounds) ?? current;
}

function optionalNumber(raw: unknown, bounds: NumberBounds, current: number | null): number | null {
  if (raw === undefined) return current;
  return clampNumber(raw, bounds);
}

function normalizeCategories(values: DiscoveryCategory[]): DiscoveryCategory[] {
  const chosen = new Set(values);
  return DISCOVERY_CATEGORIES.filter((category) => chosen.has(category));
}

/**
 * Merge a partial form submission into a trip. Returns a new profile;
 * the input trip is left as it was.
 */
export function applyTripForm(trip: TripProfile, input: TripFormInput): TripProfile {
  return {
    ...trip,
    trip_name: input.trip_name ?? trip.trip_name,
    origin: input.origin ?? trip.origin,
    destination: input.destination ?? trip.destination,
    trip_direction: input.trip_direction ?? trip.trip_direction,
    total_days_available: requiredNumber(
      input.total_days_available,
      TRIP_BOUNDS.total_days_available,
      trip.total_days_available,
    ),
    max_daily_drive_hours: requiredNumber(
      input.max_daily_drive_hours,
      TRIP_BOUNDS.max_daily_drive_hours,
      trip.max_daily_drive_hours,
    ),
    driving_days_preference: input.driving_days_preference ?? trip.driving_days_preference,
    overnight_stop_distance_style: input.overnight_stop_distance_style ?? trip.overnight_stop_distance_style,
    overall_trip_budget: optionalNumber(
      input.overall_trip_budget,
      TRIP_BOUNDS.overall_trip_budget,
      trip.overall_trip_budget,
    ),
    lodging_budget_per_night: optionalNumber(
      input.lodging_budget_per_night,
      TRIP_BOUNDS.lodging_budget_per_night,
      trip.lodging_budget_per_night,
    ),
    food_budget_per_day_per_person: optionalNumber(
      input.food_budget_per_day_per_person,
      TRIP_BOUNDS.food_budget_per_day_per_person,
      trip.food_budget_per_day_per_person,
    ),
    lodging_style: input.lodging_style ?? trip.lodging_style,
    travelers_description: input.travelers_description ?? trip.travelers_description,
    mobility_or_special_needs: input.mobility_or_special_needs ?? trip.mobility_or_special_needs,
    auto_discovery_categories: input.auto_discovery_categories
      ? normalizeCategories(input.auto_discovery_categories)
      : trip.auto_discovery_categories,
    default_max_detour_hours: requiredNumber(
      input.default_max_detour_hours,
      TRIP_BOUNDS.default_max_detour_hours,
      trip.default_max_detour_hours,
    ),
    planning_focus: input.planning_focus ?? trip.planning_focus,
    output_detail_level: input.output_detail_level ?? trip.output_detail_level,
  };
}

// ============================================================================
// POINTS OF INTEREST
// ============================================================================

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function createPointOfInterest(input: PoiFormInput): FormResult<PointOfInterest> {
  const label = input.label?.trim() ?? "";
  if (!label) {
    return { ok: false, error: MISSING_STOP_TITLE };
  }

  return {
    ok: true,
    value: {
      label,
      poi_kind: input.poi_kind ?? "specific_stop",
      location_hint: blankToNull(input.location_hint),
      category: blankToNull(input.category),
      details: blankToNull(input.details),
      max_detour_hours: clampNumber(input.max_detour_hours, POI_BOUNDS.max_detour_hours),
      min_time_on_site_hours: clampNumber(input.min_time_on_site_hours, POI_BOUNDS.min_time_on_site_hours),
      priority: input.priority ?? "nice_to_have",
    },
  };
}

export function addPointOfInterest(trip: TripProfile, input: PoiFormInput): FormResult<TripProfile> {
  const created = createPointOfInterest(input);
  if (!created.ok) return created;
  return { ok: true, value: { ...trip, points_of_interest: [...trip.points_of_interest, created.value] } };
}

/** Edit an existing stop in place of its list position */
export function updatePointOfInterest(
  trip: TripProfile,
  index: number,
  input: PoiFormInput,
): FormResult<TripProfile> {
  const existing = trip.points_of_interest[index];
  if (!Number.isInteger(index) || !existing) {
    return { ok: false, error: STOP_NOT_FOUND };
  }

  const updated: PointOfInterest = {
    label: input.label !== undefined ? input.label.trim() : existing.label,
    poi_kind: input.poi_kind ?? existing.poi_kind,
    location_hint: input.location_hint !== undefined ? blankToNull(input.location_hint) : existing.location_hint,
    category: input.category !== undefined ? blankToNull(input.category) : existing.category,
    details: input.details !== undefined ? blankToNull(input.details) : existing.details,
    max_detour_hours:
      input.max_detour_hours !== undefined
        ? clampNumber(input.max_detour_hours, POI_BOUNDS.max_detour_hours)
        : existing.max_detour_hours,
    min_time_on_site_hours:
      input.min_time_on_site_hours !== undefined
        ? clampNumber(input.min_time_on_site_hours, POI_BOUNDS.min_time_on_site_hours)
        : existing.min_time_on_site_hours,
    priority: input.priority ?? existing.priority,
  };

  const points = [...trip.points_of_interest];
  points[index] = updated;
  return { ok: true, value: { ...trip, points_of_interest: points } };
}

export function removePointOfInterest(trip: TripProfile, index: number): FormResult<TripProfile> {
  if (!Number.isInteger(index) || index < 0 || index >= trip.points_of_interest.length) {
    return { ok: false, error: STOP_NOT_FOUND };
  }
  return {
    ok: true,
    value: { ...trip, points_of_interest: trip.points_of_interest.filter((_, i) => i !== index) },
  };
}

/** Detour allowance for a stop, falling back to the trip-wide default */
export function effectiveDetourHours(poi: PointOfInterest, trip: TripProfile): number {
  return poi.max_detour_hours ?? trip.default_max_detour_hours;
}
