/**
 * Trip form layout.
 *
 * One declarative description of every field editor on the planner form.
 * The client renders sections from it and the server clamps submitted
 * values against the same numeric bounds.
 */

import {
  DETAIL_LEVELS,
  DISCOVERY_CATEGORIES,
  DRIVING_PREFERENCES,
  LODGING_STYLES,
  OVERNIGHT_STYLES,
  PLANNING_FOCUSES,
  POI_KINDS,
  POI_PRIORITIES,
  TRIP_DIRECTIONS,
  type PointOfInterest,
  type TripProfile,
} from "./schema";

// ============================================================================
// TYPES
// ============================================================================

export type FieldWidget = "text" | "textarea" | "number" | "select" | "multiselect";

export interface FieldOption {
  value: string;
  label: string;
}

export interface NumberBounds {
  min: number;
  max?: number;
  step: number;
  integer?: boolean;
  /** Zero means "unset" and is stored as null */
  zeroIsNull?: boolean;
}

export interface FieldSpec<K extends string = string> {
  key: K;
  widget: FieldWidget;
  label: string;
  help?: string;
  placeholder?: string;
  options?: FieldOption[];
  bounds?: NumberBounds;
}

export interface FormSection<K extends string = string> {
  id: string;
  title: string;
  fields: FieldSpec<K>[];
}

type EditableTripKey = Exclude<keyof TripProfile, "points_of_interest">;

// ============================================================================
// OPTION LABELS
// ============================================================================

const DIRECTION_LABELS: Record<(typeof TRIP_DIRECTIONS)[number], string> = {
  round_trip: "Round trip",
  one_way: "One way",
};

const DRIVING_LABELS: Record<(typeof DRIVING_PREFERENCES)[number], string> = {
  mostly_driving: "Mostly driving",
  balanced: "Balanced",
  mostly_activities: "Mostly activities",
};

const OVERNIGHT_LABELS: Record<(typeof OVERNIGHT_STYLES)[number], string> = {
  evenly_spread: "Evenly spread out",
  push_far_on_first_day: "Push far on day 1",
  short_first_day_then_even: "Short day 1, then even",
};

const LODGING_LABELS: Record<(typeof LODGING_STYLES)[number], string> = {
  budget: "Budget",
  mid_range: "Mid-range",
  upscale: "Upscale",
  luxury_resort: "Luxury resort",
};

export const CATEGORY_LABELS: Record<(typeof DISCOVERY_CATEGORIES)[number], string> = {
  michelin_star_dining: "Michelin-star or similar fine dining",
  other_high_end_dining: "Other upscale restaurants",
  historic_black_culture_sites: "Historic Black culture & civil rights sites",
  museums_and_culture: "Museums & cultural stops",
  waterfalls: "Waterfalls",
  hiking_trails: "Hiking trails",
  beaches_or_ocean_access: "Beaches and ocean access",
  lakes_and_waterfronts: "Lakes, rivers, and waterfronts",
  scenic_drives_or_overlooks: "Scenic drives & viewpoints",
  theme_parks: "Theme parks",
  nightlife: "Nightlife & bars",
  golf: "Golf",
};

const FOCUS_LABELS: Record<(typeof PLANNING_FOCUSES)[number], string> = {
  minimize_driving_time: "Fastest / efficient",
  maximize_scenic_or_interesting_stops: "Scenic / interesting",
  balanced: "Balanced",
};

const DETAIL_LABELS: Record<(typeof DETAIL_LEVELS)[number], string> = {
  high_level_overview: "High-level overview",
  daily_outline: "Daily outline",
  detailed_daily_plan: "Detailed day-by-day plan",
};

const POI_KIND_LABELS: Record<(typeof POI_KINDS)[number], string> = {
  specific_stop: "A specific place (hotel, restaurant, attraction)",
  city_or_region: "A city or general area",
  category_along_route: "A type of stop the AI should look for",
};

export const PRIORITY_LABELS: Record<(typeof POI_PRIORITIES)[number], string> = {
  must_do: "Must do",
  nice_to_have: "Nice to have",
};

function options<T extends string>(values: readonly T[], labels: Record<T, string>): FieldOption[] {
  return values.map((value) => ({ value, label: labels[value] }));
}

// ============================================================================
// NUMERIC BOUNDS
// ============================================================================

export const TRIP_BOUNDS = {
  total_days_available: { min: 1, max: 90, step: 1, integer: true },
  max_daily_drive_hours: { min: 1.0, max: 12.0, step: 0.5 },
  overall_trip_budget: { min: 0, step: 50, zeroIsNull: true },
  lodging_budget_per_night: { min: 0, step: 10, zeroIsNull: true },
  food_budget_per_day_per_person: { min: 0, step: 5, zeroIsNull: true },
  default_max_detour_hours: { min: 0.0, max: 6.0, step: 0.5 },
} satisfies Record<string, NumberBounds>;

export const POI_BOUNDS = {
  max_detour_hours: { min: 0.0, max: 6.0, step: 0.5, zeroIsNull: true },
  min_time_on_site_hours: { min: 0.0, max: 72.0, step: 1.0, zeroIsNull: true },
} satisfies Record<string, NumberBounds>;

// ============================================================================
// LAYOUT
// ============================================================================

export const TRIP_FORM_SECTIONS: FormSection<EditableTripKey>[] = [
  {
    id: "trip-info",
    title: "Trip Info",
    fields: [
      { key: "trip_name", widget: "text", label: "Trip name", placeholder: "e.g. Coastal loop, 12 days" },
      { key: "origin", widget: "text", label: "Starting point", help: "City and state, or a general starting area." },
      { key: "destination", widget: "text", label: "Destination", help: "City and state, or your main final destination." },
      { key: "trip_direction", widget: "select", label: "Trip type", options: options(TRIP_DIRECTIONS, DIRECTION_LABELS) },
      { key: "total_days_available", widget: "number", label: "Duration (in days)", bounds: TRIP_BOUNDS.total_days_available },
      { key: "max_daily_drive_hours", widget: "number", label: "Max driving / day (hours)", bounds: TRIP_BOUNDS.max_daily_drive_hours },
      {
        key: "driving_days_preference",
        widget: "select",
        label: "Driving / Activity balance",
        options: options(DRIVING_PREFERENCES, DRIVING_LABELS),
      },
      {
        key: "overnight_stop_distance_style",
        widget: "select",
        label: "Overnight stops",
        options: options(OVERNIGHT_STYLES, OVERNIGHT_LABELS),
      },
      { key: "overall_trip_budget", widget: "number", label: "Total budget (USD)", bounds: TRIP_BOUNDS.overall_trip_budget },
      {
        key: "lodging_budget_per_night",
        widget: "number",
        label: "Room rate max / night (USD)",
        bounds: TRIP_BOUNDS.lodging_budget_per_night,
      },
      {
        key: "food_budget_per_day_per_person",
        widget: "number",
        label: "Food budget / day / person (USD)",
        bounds: TRIP_BOUNDS.food_budget_per_day_per_person,
      },
      { key: "lodging_style", widget: "select", label: "Hotel preference", options: options(LODGING_STYLES, LODGING_LABELS) },
      {
        key: "travelers_description",
        widget: "text",
        label: "Number of travelers (or short description)",
        help: "Example: '2 adults, no kids' or 'Family of 4 with teens'.",
      },
      { key: "mobility_or_special_needs", widget: "textarea", label: "Any mobility needs or special considerations?" },
    ],
  },
  {
    id: "preferences",
    title: "Trip preferences",
    fields: [
      {
        key: "auto_discovery_categories",
        widget: "multiselect",
        label: "Trip preferences (select all that apply)",
        options: options(DISCOVERY_CATEGORIES, CATEGORY_LABELS),
      },
      {
        key: "default_max_detour_hours",
        widget: "number",
        label: "Max hours willing to deviate off main route",
        bounds: TRIP_BOUNDS.default_max_detour_hours,
      },
      { key: "planning_focus", widget: "select", label: "Overall trip style", options: options(PLANNING_FOCUSES, FOCUS_LABELS) },
    ],
  },
  {
    id: "ai-itinerary",
    title: "AI Itinerary",
    fields: [
      { key: "output_detail_level", widget: "select", label: "Itinerary detail level", options: options(DETAIL_LEVELS, DETAIL_LABELS) },
    ],
  },
];

export const POI_FORM_SECTION: FormSection<keyof PointOfInterest> = {
  id: "points-of-interest",
  title: "Points of Interest (optional)",
  fields: [
    { key: "label", widget: "text", label: "Title for this stop" },
    { key: "poi_kind", widget: "select", label: "What kind of idea is this?", options: options(POI_KINDS, POI_KIND_LABELS) },
    { key: "location_hint", widget: "text", label: "Where roughly is this? (optional)" },
    {
      key: "category",
      widget: "text",
      label: "Category for this stop (optional)",
      help: "Example: 'high_end_shopping', 'waterfall', 'historic_tour'.",
    },
    { key: "details", widget: "textarea", label: "Extra details about what you want here (optional)" },
    { key: "max_detour_hours", widget: "number", label: "Max deviation (hours)", bounds: POI_BOUNDS.max_detour_hours },
    { key: "min_time_on_site_hours", widget: "number", label: "Time allotted at stop (hours)", bounds: POI_BOUNDS.min_time_on_site_hours },
    { key: "priority", widget: "select", label: "Importance of stop", options: options(POI_PRIORITIES, PRIORITY_LABELS) },
  ],
};

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Clamp a submitted number into its bounds. Non-numeric input yields null,
 * as does zero for fields where zero means "unset".
 */
export function clampNumber(raw: unknown, bounds: NumberBounds): number | null {
  const value = typeof raw === "string" ? (raw.trim() === "" ? NaN : Number(raw)) : raw;
  if (typeof value !== "number" || !Number.isFinite(value)) return null;

  let clamped = Math.max(bounds.min, value);
  if (bounds.max !== undefined) clamped = Math.min(bounds.max, clamped);
  if (bounds.integer) clamped = Math.round(clamped);

  if (bounds.zeroIsNull && clamped === 0) return null;
  return clamped;
}

/** Summary line shown in the stop list, e.g. "Stop 2: Asheville - Must do" */
export function describeStop(poi: PointOfInterest, position: number): string {
  const label = poi.label || `Stop ${position}`;
  return `Stop ${position}: ${label} - ${PRIORITY_LABELS[poi.priority]}`;
}
