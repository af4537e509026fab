/**
 * Trip Document Serializer
 *
 * Turns a trip profile into the configuration document handed to the
 * planner AI. The user never sees it. Keys follow the profile's declaration
 * order so the prompt reads the same from one request to the next.
 */

import type {
  DetailLevel,
  DiscoveryCategory,
  DrivingPreference,
  LodgingStyle,
  OvernightStyle,
  PlanningFocus,
  PointOfInterest,
  TripDirection,
  TripProfile,
} from "@shared/schema";

// ============================================================================
// TYPES
// ============================================================================

export const DOCUMENT_VERSION = "1.1";
export const AGENT_NAME = "roadtrip_trip_planner";
export const DOCUMENT_DESCRIPTION = "User-provided configuration for a road-trip planner AI.";

export interface TripConfig {
  trip_name: string | null;
  origin: string | null;
  destination: string | null;
  trip_direction: TripDirection;
  total_days_available: number | null;
  max_daily_drive_hours: number | null;
  driving_days_preference: DrivingPreference;
  overnight_stop_distance_style: OvernightStyle;
  overall_trip_budget: number | null;
  lodging_budget_per_night: number | null;
  food_budget_per_day_per_person: number | null;
  lodging_style: LodgingStyle;
  travelers_description: string | null;
  mobility_or_special_needs: string | null;
  auto_discovery_categories: DiscoveryCategory[];
  default_max_detour_hours: number;
  points_of_interest: PointOfInterest[];
  planning_focus: PlanningFocus;
  output_detail_level: DetailLevel;
}

export interface TripDocument {
  version: string;
  agentName: string;
  description: string;
  tripConfig: TripConfig;
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Fields with a declared default get it when absent; the rest become null.
 * POI values are passed through as stored.
 */
export function toDocument(trip: Partial<TripProfile>): TripDocument {
  return {
    version: DOCUMENT_VERSION,
    agentName: AGENT_NAME,
    description: DOCUMENT_DESCRIPTION,
    tripConfig: {
      trip_name: trip.trip_name ?? null,
      origin: trip.origin ?? null,
      destination: trip.destination ?? null,
      trip_direction: trip.trip_direction ?? "round_trip",
      total_days_available: trip.total_days_available ?? null,
      max_daily_drive_hours: trip.max_daily_drive_hours ?? null,
      driving_days_preference: trip.driving_days_preference ?? "balanced",
      overnight_stop_distance_style: trip.overnight_stop_distance_style ?? "evenly_spread",
      overall_trip_budget: trip.overall_trip_budget ?? null,
      lodging_budget_per_night: trip.lodging_budget_per_night ?? null,
      food_budget_per_day_per_person: trip.food_budget_per_day_per_person ?? null,
      lodging_style: trip.lodging_style ?? "upscale",
      travelers_description: trip.travelers_description ?? null,
      mobility_or_special_needs: trip.mobility_or_special_needs ?? null,
      auto_discovery_categories: trip.auto_discovery_categories ?? [],
      default_max_detour_hours: trip.default_max_detour_hours ?? 2,
      points_of_interest: trip.points_of_interest ?? [],
      planning_focus: trip.planning_focus ?? "balanced",
      output_detail_level: trip.output_detail_level ?? "daily_outline",
    },
  };
}

/** Text form of the document, as embedded in the planner prompt */
export function formatDocument(doc: TripDocument): string {
  return JSON.stringify(doc, null, 2);
}
